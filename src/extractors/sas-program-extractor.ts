/**
 * SAS program extractor
 *
 * A program is split into `proc sql ... quit;`, `data ... run;` and other
 * procedure blocks that are evaluated in order. Every block sees a snapshot
 * of the macro environment built from the `%let` statements before it, plus
 * its own; its assignments are merged into the environment for the blocks
 * that follow.
 */

import { TableName, WriterKind } from '../types/common.js';
import { TableUsage } from '../types/extraction.js';
import { Logger, defaultLogger } from '../utils/logger.js';
import { canonicalizeTableName, isReservedWord } from '../utils/table-identity.js';
import { BaseDialectExtractor, emptyUsage } from './base-extractor.js';
import { MacroEnvironment } from './macro-environment.js';
import { blankStringLiterals, stripSasComments } from './text-scrubbing.js';

// ==================== Block splitting ====================

export type SasBlockKind = 'sql' | 'data' | 'proc';

export interface SasBlock {
  kind: SasBlockKind;
  /** Offset of the block header */
  start: number;
  /** Offset just past the terminating statement */
  end: number;
  /** Block text, header included */
  body: string;
}

const BLOCK_PATTERNS: ReadonlyArray<{ kind: SasBlockKind; start: RegExp; end: RegExp }> = [
  { kind: 'sql', start: /^\s*proc\s+sql\b[\s\S]*?;/gim, end: /\bquit\s*;\s*/gi },
  { kind: 'data', start: /^\s*data\b[\s\S]*?;/gim, end: /\brun\s*;\s*/gi },
  // other procedures carry their datasets in data=, out= and base= options
  { kind: 'proc', start: /^\s*proc\s+(?!sql\b)[A-Za-z_]\w*\b[\s\S]*?;/gim, end: /\b(?:run|quit)\s*;\s*/gi },
];

function searchFrom(pattern: RegExp, text: string, from: number): RegExpExecArray | null {
  const re = new RegExp(pattern);
  re.lastIndex = from;
  return re.exec(text);
}

/**
 * Split comment-free program text into blocks, in order of appearance
 */
export function splitSasBlocks(text: string): SasBlock[] {
  const blocks: SasBlock[] = [];
  let cursor = 0;

  while (cursor < text.length) {
    let next: { kind: SasBlockKind; header: RegExpExecArray; end: RegExp } | undefined;
    for (const pattern of BLOCK_PATTERNS) {
      const header = searchFrom(pattern.start, text, cursor);
      if (header && (!next || header.index < next.header.index)) {
        next = { kind: pattern.kind, header, end: pattern.end };
      }
    }
    if (!next) break;

    const { kind, header } = next;
    const headerEnd = header.index + header[0].length;
    const terminator = searchFrom(next.end, text, headerEnd);
    const end = terminator ? terminator.index + terminator[0].length : text.length;

    blocks.push({ kind, start: header.index, end, body: text.slice(header.index, end) });
    cursor = end;
  }

  return blocks;
}

// ==================== Statement patterns ====================

const RE_CREATE_TABLE = /\bcreate\s+table\s+([A-Za-z0-9_.&]+)/gi;
const RE_INSERT_INTO = /\binsert\s+into\s+([A-Za-z0-9_.&]+)/gi;
const RE_TRUNCATE_TABLE = /\btruncate\s+table\s+([A-Za-z0-9_.&]+)/gi;
const RE_FROM = /\bfrom\s+([A-Za-z0-9_.&]+)/gi;
const RE_JOIN = /\bjoin\s+([A-Za-z0-9_.&]+)/gi;
const RE_DATA_STMT = /^\s*data(?!\s*=)\s+([^;]+);/gim;
// SET and MERGE start a line or follow another statement's `;`
const RE_SET_STMT = /(?:^|(?<=;))\s*set(?!\s*=)\s+([^;]+);/gim;
const RE_MERGE_STMT = /(?:^|(?<=;))\s*merge(?!\s*=)\s+([^;]+);/gim;
const RE_MODIFY_STMT = /\b(insert\s+into|update|delete\s+from)\s+([A-Za-z0-9_.]+)/gi;
const RE_OUT_OPTION = /\bout\s*=\s*([A-Za-z0-9_.&]+)/gi;
const RE_BASE_OPTION = /\bbase\s*=\s*([A-Za-z0-9_.&]+)/gi;
const RE_DATA_OPTION = /\bdata\s*=\s*([A-Za-z0-9_.&]+)/gi;

const RE_INPUT_HINT = /^_input\d*$/;
const RE_OUTPUT_HINT = /^_output\d*$/;

/**
 * Split a DATA or SET statement's operand list, skipping dataset options
 */
export function splitDatasetList(clause: string): string[] {
  if (!clause.trim() || clause.trim().startsWith('=')) return [];

  const tokens: string[] = [];
  let current = '';
  let depth = 0;

  for (const ch of clause) {
    if (ch === '(') {
      depth++;
      continue;
    }
    if (ch === ')') {
      depth = Math.max(0, depth - 1);
      continue;
    }
    if (depth > 0) continue;
    if (' ,\t\r\n/;'.includes(ch)) {
      if (current) {
        tokens.push(current);
        current = '';
      }
      if (ch === ';') break;
      continue;
    }
    current += ch;
  }
  if (current) tokens.push(current);

  return tokens.filter((token) => !isReservedWord(token));
}

// ==================== Extractor ====================

export class SasProgramExtractor extends BaseDialectExtractor {
  readonly name = 'sas-program';
  readonly extensions: readonly string[] = ['.sas'];
  readonly writerKind: WriterKind = 'sas_program';
  override readonly expandsMacros: boolean = true;

  private readonly logger: Logger;

  constructor(logger: Logger = defaultLogger.child('sas')) {
    super();
    this.logger = logger;
  }

  analyse(text: string): TableUsage {
    const program = stripSasComments(text);
    const usage = emptyUsage();
    let env = MacroEnvironment.empty();
    let cursor = 0;

    for (const block of splitSasBlocks(program)) {
      env = env.with(env.evaluateAssignments(program.slice(cursor, block.start)));

      const blockUpdates = env.evaluateAssignments(block.body);
      const local = env.with(blockUpdates);
      this.analyseBlock(block, local, usage);

      env = local;
      cursor = block.end;
    }

    return usage;
  }

  /**
   * Tables the program needs from outside: read and never written by it
   */
  override extractReadTables(text: string): Set<TableName> {
    const { reads, writes } = this.analyse(text);
    return new Set([...reads].filter((table) => !writes.has(table)));
  }

  private analyseBlock(block: SasBlock, env: MacroEnvironment, usage: TableUsage): void {
    const body = blankStringLiterals(env.expand(block.body));
    const resolve = (token: string): TableName | undefined => this.resolve(token, env);
    const add = (into: Set<TableName>, token: string): void => {
      const table = resolve(token);
      if (table) into.add(table);
    };

    for (const pattern of [RE_CREATE_TABLE, RE_INSERT_INTO, RE_TRUNCATE_TABLE]) {
      for (const match of body.matchAll(pattern)) add(usage.writes, match[1]);
    }
    for (const pattern of [RE_FROM, RE_JOIN]) {
      for (const match of body.matchAll(pattern)) add(usage.reads, match[1]);
    }

    for (const match of body.matchAll(RE_DATA_STMT)) {
      for (const token of splitDatasetList(match[1])) add(usage.writes, token);
    }
    for (const match of body.matchAll(RE_SET_STMT)) {
      // `update master transaction; set ...` is not a dataset read
      const start = (match.index ?? 0) + match[0].toLowerCase().indexOf('set');
      const previous = start > 0 ? body.lastIndexOf(';', start - 1) : -1;
      if (body.slice(previous + 1, start).toLowerCase().includes('update')) continue;
      for (const token of splitDatasetList(match[1])) add(usage.reads, token);
    }
    for (const match of body.matchAll(RE_MERGE_STMT)) {
      for (const token of splitDatasetList(match[1])) add(usage.reads, token);
    }

    for (const match of body.matchAll(RE_MODIFY_STMT)) {
      const verb = match[1].toLowerCase();
      add(verb.startsWith('delete') ? usage.reads : usage.writes, match[2]);
    }

    for (const match of body.matchAll(RE_OUT_OPTION)) add(usage.writes, match[1]);
    for (const match of body.matchAll(RE_BASE_OPTION)) add(usage.writes, match[1]);
    for (const match of body.matchAll(RE_DATA_OPTION)) add(usage.reads, match[1]);

    // generated DI jobs pass their datasets through these macro variables
    for (const [name, value] of env.entries()) {
      const isRead = name === 'syslast' || RE_INPUT_HINT.test(name);
      const isWrite = RE_OUTPUT_HINT.test(name);
      if (!isRead && !isWrite) continue;
      add(isRead ? usage.reads : usage.writes, value);
    }
  }

  private resolve(token: string, env: MacroEnvironment): TableName | undefined {
    const table = canonicalizeTableName(token, (raw) => env.expand(raw));
    if (!table) {
      this.logger.debug('Ignored unresolvable table reference', { token });
    }
    return table;
  }
}
