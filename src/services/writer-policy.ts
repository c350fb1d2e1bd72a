/**
 * Writer resolution policies
 *
 * When several writers produce one table their upstream sets are combined by a
 * policy. `union` treats every writer as an alternative production route whose
 * inputs may all be required; `intersection` keeps only inputs all writers share.
 */

import { IWriterResolutionPolicy } from '../interfaces/services.js';
import { TableName, WriterPolicyName } from '../types/index.js';

export class UnionWriterPolicy implements IWriterResolutionPolicy {
  readonly name: WriterPolicyName = 'union';

  combine(upstreamSets: Set<TableName>[]): Set<TableName> {
    const combined = new Set<TableName>();
    for (const set of upstreamSets) {
      for (const table of set) combined.add(table);
    }
    return combined;
  }
}

export class IntersectionWriterPolicy implements IWriterResolutionPolicy {
  readonly name: WriterPolicyName = 'intersection';

  combine(upstreamSets: Set<TableName>[]): Set<TableName> {
    if (upstreamSets.length === 0) return new Set();
    const [first, ...rest] = upstreamSets;
    return new Set([...first].filter((table) => rest.every((set) => set.has(table))));
  }
}

export function createWriterPolicy(name: WriterPolicyName): IWriterResolutionPolicy {
  switch (name) {
    case 'union':
      return new UnionWriterPolicy();
    case 'intersection':
      return new IntersectionWriterPolicy();
  }
}
