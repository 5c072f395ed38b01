import { afterEach, describe, expect, it, vi } from 'vitest';

import { JsonLineLogger, noopLogger, PrettyLineLogger } from './structured-logger.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('JsonLineLogger', () => {
  it('serialises log entries as newline-delimited JSON', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));

    const write = vi.fn();
    const logger = new JsonLineLogger({ write });

    const entry = {
      level: 'info',
      name: 'compiler',
      event: 'compiler.stage',
      data: { stage: 'analyze' },
    } as const;

    logger.log(entry);

    expect(write).toHaveBeenCalledWith(
      `${JSON.stringify({
        ...entry,
        timestamp: '2024-01-01T00:00:00.000Z',
      })}\n`,
    );
  });
});

describe('PrettyLineLogger', () => {
  it('writes level, event, elapsed time and data on one line', () => {
    const write = vi.fn();
    const logger = new PrettyLineLogger({ write });

    logger.log({
      level: 'info',
      name: 'compiler',
      event: 'compiler.stage',
      elapsedMs: 12.345,
      data: { stage: 'analyze' },
    });

    expect(write).toHaveBeenCalledWith('[info] compiler.stage (12.3ms) {"stage":"analyze"}\n');
  });

  it('omits elapsed time and data when absent', () => {
    const write = vi.fn();
    new PrettyLineLogger({ write }).log({ level: 'warn', name: 'cli', event: 'cli.start' });

    expect(write).toHaveBeenCalledWith('[warn] cli.start\n');
  });
});

describe('noopLogger', () => {
  it('ignores log entries', () => {
    const logger = noopLogger;
    expect(() => logger.log({ level: 'debug', name: 'noop', event: 'ignored' })).not.toThrow();
  });
});
