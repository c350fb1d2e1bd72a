/**
 * Unit tests for layer promotion
 */

import { describe, it, expect } from 'vitest';
import { expandLayers, layerColumnsOf, rowsFromRecords } from '../../../services/layer-expansion.js';
import { LineageError } from '../../../types/index.js';

describe('expandLayers', () => {
  it('should give every intermediate layer rows of its own', () => {
    const rows = [{ target: 'ads.tgt', layers: ['ads.mid', 'ads.stg'], source: 'ads.src' }];

    expect(expandLayers(rows)).toEqual([
      { target: 'ads.tgt', layers: ['ads.mid', 'ads.stg'], source: 'ads.src' },
      { target: 'ads.mid', layers: ['ads.stg'], source: 'ads.src' },
      { target: 'ads.stg', layers: [], source: 'ads.src' }
    ]);
  });

  it('should keep original targets first and drop duplicate rows', () => {
    const rows = [
      { target: 'db.t1', layers: ['db.m1'], source: 'db.s' },
      { target: 'db.t2', layers: ['db.m1'], source: 'db.s' }
    ];

    expect(expandLayers(rows)).toEqual([
      { target: 'db.t1', layers: ['db.m1'], source: 'db.s' },
      { target: 'db.t2', layers: ['db.m1'], source: 'db.s' },
      { target: 'db.m1', layers: [], source: 'db.s' }
    ]);
  });

  it('should not promote layers that are already targets', () => {
    const rows = [
      { target: 'db.t1', layers: ['db.t2'], source: 'db.s' },
      { target: 'db.t2', layers: [], source: 'db.s' }
    ];
    expect(expandLayers(rows)).toEqual(rows);
  });

  it('should skip rows without a target', () => {
    expect(expandLayers([{ target: ' ', layers: [], source: 'db.s' }])).toEqual([]);
  });
});

describe('reading lineage records', () => {
  it('should order layer columns numerically', () => {
    expect(layerColumnsOf(['Target Table', 'Layer 10', 'Layer 2', 'Layer 1', 'Source Table'])).toEqual([
      'Layer 1',
      'Layer 2',
      'Layer 10'
    ]);
  });

  it('should skip empty layer cells', () => {
    const header = ['Target Table', 'Layer 2', 'Layer 1', 'Source Table'];
    const records = [{ 'Target Table': 'db.a', 'Layer 1': 'db.b', 'Layer 2': '', 'Source Table': 'db.c' }];

    expect(rowsFromRecords(header, records)).toEqual([{ target: 'db.a', layers: ['db.b'], source: 'db.c' }]);
  });

  it('should require target and source columns', () => {
    expect(() => rowsFromRecords(['Target Table'], [])).toThrow(LineageError);
    expect(() => rowsFromRecords(['Target Table'], [])).toThrow('Missing required column: Source Table');
  });
});
