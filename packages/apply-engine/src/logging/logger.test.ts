import { describe, expect, it } from 'vitest';

import { MemoryTransport, createLogger, formatLogEntry, shouldLog } from './logger.js';

describe('logger', () => {
  it('filters by level', () => {
    expect(shouldLog('debug', 'warn')).toBe(false);
    expect(shouldLog('error', 'warn')).toBe(true);
    expect(shouldLog('error', 'silent')).toBe(false);

    const transport = new MemoryTransport();
    const logger = createLogger({ level: 'info', transports: [transport] });
    logger.debug('hidden');
    logger.info('shown');
    logger.error('failed', { changeId: 'c1' });

    expect(transport.messages()).toEqual(['shown', 'failed']);
    expect(transport.messages('error')).toEqual(['failed']);
    expect(transport.entries[1]?.metadata).toEqual({ changeId: 'c1' });
  });

  it('scopes child loggers by subsystem', () => {
    const transport = new MemoryTransport();
    const logger = createLogger({ level: 'debug', subsystem: 'engine', transports: [transport] });
    logger.child('resolver').debug('resolved');

    expect(transport.entries[0]?.subsystem).toBe('engine:resolver');
    expect(logger.child('resolver').isLevelEnabled('trace')).toBe(false);
  });

  it('formats one line per entry', () => {
    const line = formatLogEntry(
      {
        timestamp: new Date('2026-01-02T03:04:05.000Z'),
        level: 'warn',
        subsystem: 'resctl:executor',
        message: 'slow call',
        metadata: { ms: 1200 },
      },
      { colors: false },
    );

    expect(line).toBe('2026-01-02T03:04:05.000Z WARN  [resctl:executor] slow call {"ms":1200}');
  });

  it('can leave timestamps out', () => {
    const line = formatLogEntry(
      { timestamp: new Date(0), level: 'error', subsystem: 'resctl', message: 'boom' },
      { colors: false, timestamps: false },
    );
    expect(line).toBe('ERROR [resctl] boom');
  });
});
