/**
 * Extractor registry
 *
 * Resolves the extractors that apply to a file and the one that computes the
 * upstream set of a writer kind.
 */

import { WriterKind } from '../types/common.js';
import { DialectExtractor } from '../types/extraction.js';
import { Logger } from '../utils/logger.js';
import { PipelineScriptExtractor } from './pipeline-script-extractor.js';
import { SasProgramExtractor } from './sas-program-extractor.js';
import { ViewDefinitionExtractor } from './view-definition-extractor.js';

export class ExtractorRegistry {
  private readonly extractors: DialectExtractor[];

  constructor(extractors: DialectExtractor[]) {
    const kinds = new Set<WriterKind>();
    for (const extractor of extractors) {
      if (kinds.has(extractor.writerKind)) {
        throw new Error(`Duplicate extractor for writer kind ${extractor.writerKind}`);
      }
      kinds.add(extractor.writerKind);
    }
    this.extractors = [...extractors];
  }

  /**
   * Registry with the pipeline script, view definition and SAS extractors
   */
  static withDefaults(logger?: Logger): ExtractorRegistry {
    return new ExtractorRegistry([
      new PipelineScriptExtractor(),
      new ViewDefinitionExtractor(),
      new SasProgramExtractor(logger?.child('sas')),
    ]);
  }

  list(): readonly DialectExtractor[] {
    return this.extractors;
  }

  /**
   * Extractors for a file path, by its lower-cased extension
   */
  forFile(path: string): DialectExtractor[] {
    const extension = fileExtension(path);
    return this.extractors.filter((extractor) => extractor.extensions.includes(extension));
  }

  forKind(kind: WriterKind): DialectExtractor | undefined {
    return this.extractors.find((extractor) => extractor.writerKind === kind);
  }

  /**
   * Every extension some extractor handles
   */
  extensions(): string[] {
    return [...new Set(this.extractors.flatMap((extractor) => [...extractor.extensions]))].sort();
  }
}

export function fileExtension(path: string): string {
  const name = path.slice(path.lastIndexOf('/') + 1);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot).toLowerCase() : '';
}
