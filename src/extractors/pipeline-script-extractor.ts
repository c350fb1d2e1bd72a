/**
 * Pipeline script extractor
 *
 * Spark jobs and SQL scripts declare what they produce in an "Output table(s)"
 * comment header; DataFrame writer calls are a second write signal. Reads are
 * `spark.table('db.tbl')` references.
 */

import { TableName, WriterKind } from '../types/common.js';
import { TableUsage } from '../types/extraction.js';
import { qualifyTableName } from '../utils/table-identity.js';
import { BaseDialectExtractor } from './base-extractor.js';
import { normalizeInvisibles } from './text-scrubbing.js';

// ==================== Patterns ====================

const RE_COMMENT_LINE = /^\s*(#|\/\/|\/\*|\*|--)/;
const RE_BANNER = /^\s*#{5,}\s*$/;
const RE_LEADING_DECORATION = /^[\s#/*\-|>]+/;

const RE_OUTPUT_HEADER = /^output\s+tables?\b/;
const RE_SECTION_LABEL =
  /^(input|job|jobs|user|used|usage|purpose|revision|revisions|history|company|author|date|data|datastage|sas|view)\b/;
const RE_GENERIC_LABEL = /^[a-z][a-z0-9 _/\-()]*\s*[:\uff1a\u2013\u2014-]\s*$/;

// qualified name followed by whitespace, list punctuation, a comment marker or end of line
const RE_INLINE_FQTN = /\b([a-z0-9_]+)\.([a-z0-9_]+)(?=[\s,;)\]#-]|$)/g;

const RE_INSERT_INTO = /\.insertinto\(\s*['"]([a-z0-9_]+)\.([a-z0-9_]+)['"]\s*[,)]/g;
const RE_SAVE_AS_TABLE = /\.saveastable\(\s*['"]([a-z0-9_]+)\.([a-z0-9_]+)['"]\s*[,)]/g;
const RE_SPARK_TABLE = /\bspark\.(?:read\.)?table\(\s*['"]([a-z0-9_]+)\.([a-z0-9_]+)['"]\s*\)/g;

// ==================== Header parsing ====================

function normalizeHeaderLine(line: string): string {
  return normalizeInvisibles(line).toLowerCase().trimEnd().replace(RE_LEADING_DECORATION, '');
}

function isCommentOrBlank(rawLine: string): boolean {
  return rawLine.trim() === '' || RE_COMMENT_LINE.test(rawLine) || RE_BANNER.test(rawLine);
}

function isOutputHeader(line: string): boolean {
  return RE_OUTPUT_HEADER.test(line);
}

function isSectionBreak(line: string): boolean {
  return RE_BANNER.test(line) || RE_SECTION_LABEL.test(line) || RE_GENERIC_LABEL.test(line);
}

/**
 * Qualified names listed under every "Output table(s)" header. A section ends
 * at the first code line or at the next header-like label.
 */
export function parseOutputHeaderTables(text: string): Set<TableName> {
  const tables = new Set<TableName>();
  const rawLines = text.split(/\r?\n/);
  const lines = rawLines.map(normalizeHeaderLine);

  let i = 0;
  while (i < lines.length) {
    if (!isOutputHeader(lines[i])) {
      i++;
      continue;
    }

    // a header line may already carry tables: `# Output table: db.tbl`
    collectInline(lines[i].replace(RE_OUTPUT_HEADER, ''), tables);
    i++;

    while (i < lines.length) {
      if (!isCommentOrBlank(rawLines[i])) break;
      if (isSectionBreak(lines[i]) && !isOutputHeader(lines[i])) break;
      collectInline(lines[i], tables);
      i++;
    }
  }

  return tables;
}

function collectInline(line: string, into: Set<TableName>): void {
  for (const match of line.matchAll(RE_INLINE_FQTN)) {
    into.add(qualifyTableName(match[1], match[2]));
  }
}

function collectQualified(text: string, pattern: RegExp): Set<TableName> {
  const tables = new Set<TableName>();
  for (const match of text.matchAll(pattern)) {
    tables.add(qualifyTableName(match[1], match[2]));
  }
  return tables;
}

// ==================== Extractor ====================

export class PipelineScriptExtractor extends BaseDialectExtractor {
  readonly name = 'pipeline-script';
  readonly extensions: readonly string[] = ['.py', '.sql'];
  readonly writerKind: WriterKind = 'pipeline_script';

  analyse(text: string): TableUsage {
    const lowered = text.toLowerCase();

    const writes = parseOutputHeaderTables(text);
    for (const table of collectQualified(lowered, RE_INSERT_INTO)) writes.add(table);
    for (const table of collectQualified(lowered, RE_SAVE_AS_TABLE)) writes.add(table);

    return {
      reads: collectQualified(lowered, RE_SPARK_TABLE),
      writes,
    };
  }
}
