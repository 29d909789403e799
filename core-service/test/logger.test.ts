/**
 * Logger - Test Suite
 */

import { afterEach, beforeAll, describe, expect, it } from 'vitest';
import {
  configureLogger,
  createChildLogger,
  getCorrelationId,
  isLogLevel,
  logger,
  setLogLevel,
  subscribeToLogs,
  withCorrelationId,
  type LogEntry,
} from '../src/index.js';

beforeAll(() => {
  configureLogger({ output: false });
});

afterEach(() => {
  setLogLevel('info');
});

function capture(): { entries: LogEntry[]; stop: () => void } {
  const entries: LogEntry[] = [];
  const stop = subscribeToLogs(entry => {
    entries.push(entry);
  });
  return { entries, stop };
}

describe('logger', () => {
  it('should notify subscribers at or above the configured level', () => {
    const { entries, stop } = capture();
    setLogLevel('warn');

    logger.info('ignored');
    logger.warn('kept', { userId: 'u1' });
    stop();
    logger.error('after unsubscribe');

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 'warn', message: 'kept', data: { userId: 'u1' } });
  });

  it('should attach the correlation id of the surrounding request', async () => {
    const { entries, stop } = capture();

    await withCorrelationId('req-1', async () => {
      expect(getCorrelationId()).toBe('req-1');
      logger.info('inside');
    });
    stop();

    expect(entries[0].correlationId).toBe('req-1');
    expect(getCorrelationId()).toBeUndefined();
  });

  it('should tag child logger entries with their service and metadata', () => {
    const { entries, stop } = capture();

    createChildLogger({ service: 'access-engine', metadata: { component: 'graph' } }).info('child', { roleId: 'r' });
    stop();

    expect(entries[0]).toMatchObject({
      service: 'access-engine',
      message: 'child',
      data: { component: 'graph', roleId: 'r' },
    });
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('critical')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
