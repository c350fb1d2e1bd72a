/**
 * Table identity
 *
 * Turns table references found in source text into canonical keys: `schema.table`
 * or a bare name, lower-cased. Tokens that cannot be resolved confidently yield
 * `undefined` and must be ignored by callers.
 */

import { readFileSync } from 'node:fs';
import { TableName } from '../types/common.js';

const RESERVED_WORDS: ReadonlySet<string> = new Set(
  parseWordList(readFileSync(new URL('./reserved-words.json', import.meta.url), 'utf-8'))
);

function parseWordList(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((word): word is string => typeof word === 'string');
}

const RE_QUALIFIED = /^([A-Za-z0-9_]+)\.([A-Za-z0-9_]+)$/;
const RE_BARE = /^[A-Za-z0-9_]+$/;
const RE_NUMERAL = /^\d+(\.\d+)?$/;
// Macro references, SAS functions and template placeholders left unexpanded
const RE_PLACEHOLDER = /[&%{}$]/;

/**
 * Canonical case for comparisons and index keys
 */
export function toTableKey(name: string): TableName {
  return name.trim().toLowerCase();
}

export function qualifyTableName(schema: string, table: string): TableName {
  return `${schema}.${table}`.toLowerCase();
}

export function isQualified(name: TableName): boolean {
  return name.includes('.');
}

/**
 * Table part of a possibly qualified name
 */
export function bareTableName(name: TableName): string {
  const dot = name.indexOf('.');
  return dot >= 0 ? name.slice(dot + 1) : name;
}

export function isReservedWord(token: string): boolean {
  return RESERVED_WORDS.has(token.toLowerCase());
}

/**
 * Resolve a raw token to a canonical table name.
 *
 * `expand` substitutes macro references before validation; SAS callers pass
 * their environment snapshot, other dialects pass nothing.
 */
export function canonicalizeTableName(
  token: string,
  expand?: (text: string) => string
): TableName | undefined {
  if (!token) return undefined;

  let cleaned = token.trim().replace(/[;,]+$/, '');
  // dataset options: `lib.tbl(drop=x)`, `tbl / view=v`
  cleaned = cleaned.split('/')[0].split('(')[0].trim();
  if (!cleaned) return undefined;

  let expanded = expand ? expand(cleaned) : cleaned;
  expanded = expanded
    .trim()
    .replace(/^[`'"]+|[`'"]+$/g, '')
    .split('(')[0]
    .split('/')[0]
    .trim()
    .replace(/\.+$/, '');

  if (!expanded || RE_PLACEHOLDER.test(expanded)) return undefined;
  if (expanded.toUpperCase() === '_NULL_') return undefined;
  if (RE_NUMERAL.test(expanded)) return undefined;

  const qualified = RE_QUALIFIED.exec(expanded);
  if (qualified) {
    return qualifyTableName(qualified[1], qualified[2]);
  }

  if (RE_BARE.test(expanded)) {
    const lower = expanded.toLowerCase();
    if (lower.length === 1 || RESERVED_WORDS.has(lower)) return undefined;
    return lower;
  }

  return undefined;
}

/**
 * Word-bounded, case-insensitive matcher for a table's literal name
 */
export function tableNamePattern(name: TableName): RegExp {
  const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`\\b${escaped}\\b`, 'i');
}
