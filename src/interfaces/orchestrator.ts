/**
 * Lineage Tracer Orchestrator interface for the pipeline lineage tracer
 */

import { LineageRunReport, ScriptTableSummary, ScriptTargetPair } from '../types/index.js';

/**
 * Lineage Tracer Orchestrator interface
 * Coordinates indexing, target expansion, enumeration and shaping for one corpus
 */
export interface ILineageTracerOrchestrator {
  trace(rawTargets: string[]): LineageRunReport;
  mapScripts(): ScriptTargetPair[];
  inspect(): ScriptTableSummary[];
}
