import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, getLogger, configureLogger, type LogEntry } from '../logger.js';

function capture(level: Logger['level'] = 'debug'): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({
    level,
    component: 'test',
    enableConsole: false,
    onLog: (entry) => entries.push(entry),
  });
  return { logger, entries };
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('filters entries below the configured level', () => {
    const { logger, entries } = capture('warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(entries.map((entry) => entry.message)).toEqual(['shown']);
  });

  it('drops everything when silent', () => {
    const { logger, entries } = capture('silent');
    logger.error('nope', new Error('x'));
    expect(entries).toHaveLength(0);
  });

  it('scopes child components', () => {
    const { logger, entries } = capture();

    logger.child('loader').info('hello', { fields: 3 });

    expect(entries[0]?.component).toBe('test.loader');
    expect(entries[0]?.context).toEqual({ fields: 3 });
  });

  it('records error code and message', () => {
    const { logger, entries } = capture();
    const error = Object.assign(new Error('bad'), { code: 'E_BAD' });

    logger.error('failed', error);

    expect(entries[0]?.error?.code).toBe('E_BAD');
    expect(entries[0]?.error?.message).toBe('bad');
  });

  it('writes structured lines to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new Logger({ component: 'json', enableStructured: true });

    logger.info('ready');

    expect(spy).toHaveBeenCalledTimes(1);
    const parsed: unknown = JSON.parse(String(spy.mock.calls[0]?.[0]));
    expect(parsed).toMatchObject({ level: 'info', component: 'json', message: 'ready' });
  });

  it('writes human readable lines with the level prefix', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new Logger({ component: 'plain' });

    logger.warn('careful');

    expect(String(spy.mock.calls[0]?.[0])).toMatch(/\[WARN\] \[plain\] careful$/);
  });
});

describe('getLogger', () => {
  it('returns child loggers of the configured default', () => {
    configureLogger({ component: 'root', level: 'error', enableConsole: false });

    const child = getLogger('config');

    expect(child.component).toBe('root.config');
    expect(child.level).toBe('error');
  });
});
