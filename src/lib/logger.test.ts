import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, parseLogLevel, setLogLevel } from './logger';

describe('parseLogLevel', () => {
  it('accepts level names in any case', () => {
    expect(parseLogLevel('WARN')).toBe('warn');
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});

describe('createLogger', () => {
  afterEach(() => {
    setLogLevel('error');
    vi.restoreAllMocks();
  });

  it('writes one JSON line per entry', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('info');

    createLogger('resolver').info('Resolved citation', { citation: 'Ex. 1' });

    expect(log).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ level: 'info', service: 'resolver', message: 'Resolved citation', citation: 'Ex. 1' });
  });

  it('drops entries below the level and routes warnings to stderr', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');

    const logger = createLogger('pdf-source').child('scan');
    logger.info('ignored');
    logger.warn('Retrying PDF read');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toContain('"service":"pdf-source:scan"');
  });
});
