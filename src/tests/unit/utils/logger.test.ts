/**
 * Unit tests for the namespaced logger
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemorySink, Logger } from '../../../utils/logger.js';

describe('Logger', () => {
  let sink: InMemorySink;

  beforeEach(() => {
    sink = new InMemorySink();
  });

  it('should drop events below the minimum level', () => {
    const logger = new Logger('lineage', [sink], 'warn');
    logger.info('ignored');
    logger.warn('kept', { table: 'db.a' });

    expect(sink.read()).toHaveLength(1);
    expect(sink.read()[0]).toMatchObject({
      level: 'warn',
      namespace: 'lineage',
      message: 'kept',
      context: { table: 'db.a' }
    });
  });

  it('should share sinks and level with children', () => {
    const logger = new Logger('lineage', [sink], 'debug');
    logger.child('corpus').debug('scanned');

    expect(sink.read()[0].namespace).toBe('lineage:corpus');
  });

  it('should apply level changes to later events', () => {
    const logger = new Logger('lineage', [sink], 'error');
    logger.info('first');
    logger.setLevel('info');
    logger.info('second');

    expect(sink.read().map((event) => event.message)).toEqual(['second']);
    expect(logger.isEnabled('debug')).toBe(false);
  });

  it('should clear recorded events', () => {
    const logger = new Logger('lineage', [sink]);
    logger.error('failed');
    sink.clear();
    expect(sink.read()).toEqual([]);
  });
});
