/**
 * Target Resolver
 * Expands requested targets into canonical table names known to the writer index
 */

import { ITargetResolver, IWriterIndex, TargetSelection } from '../interfaces/services.js';
import { TableName, TargetSelectionError } from '../types/index.js';
import { Logger, defaultLogger } from '../utils/logger.js';
import { isQualified, toTableKey } from '../utils/table-identity.js';

/**
 * Split a comma-separated target list, dropping empty entries
 */
export function splitTargetList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

export class TargetResolver implements ITargetResolver {
  private readonly writerIndex: IWriterIndex;
  private readonly logger: Logger;

  constructor(writerIndex: IWriterIndex, logger: Logger = defaultLogger.child('targets')) {
    this.writerIndex = writerIndex;
    this.logger = logger;
  }

  /**
   * Qualified names are taken as given; a bare name becomes every indexed
   * `schema.<name>` (and the bare name itself when indexed). Throws
   * TargetSelectionError when nothing is left.
   */
  resolveTargets(rawTargets: string[]): TargetSelection {
    const targets: TableName[] = [];
    const unmatched: string[] = [];
    const seen = new Set<TableName>();
    const add = (table: TableName): void => {
      if (seen.has(table)) return;
      seen.add(table);
      targets.push(table);
    };

    for (const raw of rawTargets.map((item) => item.trim()).filter((item) => item !== '')) {
      const key = toTableKey(raw);
      if (isQualified(key)) {
        add(key);
        continue;
      }

      const candidates = this.expandBareName(key);
      if (candidates.length === 0) {
        unmatched.push(raw);
        this.logger.warn('No indexed table matches bare target', { target: raw });
        continue;
      }
      this.logger.info('Bare target expanded', { target: raw, candidates });
      candidates.forEach(add);
    }

    if (targets.length === 0) {
      throw new TargetSelectionError(
        rawTargets,
        'No valid targets to process. Provide names like schema.table, or bare names present in the writer index.'
      );
    }
    return { targets, unmatched };
  }

  expandBareName(bare: string): TableName[] {
    const key = toTableKey(bare);
    const suffix = `.${key}`;
    return this.writerIndex
      .tables()
      .filter((table) => table === key || table.endsWith(suffix))
      .sort();
  }
}
