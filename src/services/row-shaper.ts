/**
 * Path-to-Row Shaper
 * Turns variable-length lineage paths into rows with numbered Layer columns
 */

import { IRowShaper } from '../interfaces/services.js';
import { LineagePath, LineageRecord, LineageRow, PathShapeError, TableName } from '../types/index.js';
import { toTableKey } from '../utils/table-identity.js';

export const TARGET_COLUMN = 'Target Table';
export const SOURCE_COLUMN = 'Source Table';

export function layerColumn(position: number): string {
  return `Layer ${position}`;
}

export class LineageRowShaper implements IRowShaper {
  /**
   * One row per path. Throws PathShapeError when a path is empty or does not
   * start at `target`.
   */
  shape(target: TableName, paths: LineagePath[]): LineageRow[] {
    const key = toTableKey(target);
    return paths.map((path) => {
      if (path.length === 0) {
        throw new PathShapeError(key, `Empty lineage path for target ${key}`);
      }
      if (path[0] !== key) {
        throw new PathShapeError(key, `Lineage path starts at ${path[0]}, expected ${key}`);
      }
      if (path.length === 1) {
        return { target: key, layers: [], source: path[0] };
      }
      return { target: key, layers: path.slice(1, -1), source: path[path.length - 1] };
    });
  }

  /**
   * Column schema for a set of rows: the widest row decides the Layer count
   */
  columnsFor(rows: LineageRow[]): string[] {
    const width = rows.reduce((max, row) => Math.max(max, row.layers.length), 0);
    const layers = Array.from({ length: width }, (_, i) => layerColumn(i + 1));
    return [TARGET_COLUMN, ...layers, SOURCE_COLUMN];
  }

  /**
   * Record keyed by column; Layer columns past the row's width are left unset
   */
  toRecord(row: LineageRow): LineageRecord {
    const record: LineageRecord = { [TARGET_COLUMN]: row.target };
    row.layers.forEach((table, i) => {
      record[layerColumn(i + 1)] = table;
    });
    record[SOURCE_COLUMN] = row.source;
    return record;
  }
}
