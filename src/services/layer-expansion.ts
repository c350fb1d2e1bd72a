/**
 * Layer promotion
 *
 * Every intermediate Layer table that is not already a target gets rows of its
 * own: the later layers renumbered from 1 and the same Source.
 */

import { LineageError, ErrorCategory, LineageRow, TableName } from '../types/index.js';
import { CsvRecord } from '../utils/csv.js';
import { SOURCE_COLUMN, TARGET_COLUMN } from './row-shaper.js';

const RE_LAYER_COLUMN = /^Layer\s+(\d+)$/;

/**
 * Rows plus promoted layer rows, grouped by target: original targets in order
 * of first appearance, then promoted ones in order of creation. Exact
 * duplicates are dropped.
 */
export function expandLayers(rows: LineageRow[]): LineageRow[] {
  const baseTargets = new Set(rows.map((row) => row.target.trim()).filter((target) => target !== ''));
  const grouped = new Map<TableName, LineageRow[]>();
  const order: TableName[] = [];

  const append = (target: TableName, row: LineageRow): void => {
    const group = grouped.get(target);
    if (group) {
      group.push(row);
    } else {
      grouped.set(target, [row]);
    }
  };

  for (const row of rows) {
    const target = row.target.trim();
    if (!target) continue;
    if (!order.includes(target)) order.push(target);
    append(target, { target, layers: [...row.layers], source: row.source });

    row.layers.forEach((layer, i) => {
      const promoted = layer.trim();
      if (!promoted || baseTargets.has(promoted)) return;
      append(promoted, {
        target: promoted,
        layers: row.layers.slice(i + 1).map((tail) => tail.trim()).filter((tail) => tail !== ''),
        source: row.source,
      });
    });
  }

  for (const target of grouped.keys()) {
    if (!order.includes(target)) order.push(target);
  }

  const seen = new Set<string>();
  const expanded: LineageRow[] = [];
  for (const target of order) {
    for (const row of grouped.get(target) ?? []) {
      const signature = JSON.stringify([row.target, ...row.layers, row.source]);
      if (seen.has(signature)) continue;
      seen.add(signature);
      expanded.push(row);
    }
  }
  return expanded;
}

/**
 * Layer column names of a header, in numeric order
 */
export function layerColumnsOf(header: string[]): string[] {
  return header
    .map((column) => ({ column, match: RE_LAYER_COLUMN.exec(column.trim()) }))
    .filter((entry): entry is { column: string; match: RegExpExecArray } => entry.match !== null)
    .sort((a, b) => Number(a.match[1]) - Number(b.match[1]))
    .map((entry) => entry.column);
}

/**
 * Rows from records of a lineage CSV. Empty layer cells are skipped.
 */
export function rowsFromRecords(header: string[], records: CsvRecord[]): LineageRow[] {
  for (const required of [TARGET_COLUMN, SOURCE_COLUMN]) {
    if (!header.includes(required)) {
      throw new LineageError(`Missing required column: ${required}`, ErrorCategory.INVALID_INPUT);
    }
  }

  const layerColumns = layerColumnsOf(header);
  return records.map((record) => ({
    target: (record[TARGET_COLUMN] ?? '').trim(),
    layers: layerColumns.map((column) => (record[column] ?? '').trim()).filter((value) => value !== ''),
    source: (record[SOURCE_COLUMN] ?? '').trim(),
  }));
}
