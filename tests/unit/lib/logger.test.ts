import { describe, it, expect, jest } from '@jest/globals';
import { getLogger, Logger } from '@/lib/logger';

function lastEntry(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
  const calls = spy.mock.calls;
  return JSON.parse(String(calls[calls.length - 1][0]));
}

describe('Logger', () => {
  it('drops entries below the minimum level', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new Logger('warn');

    logger.debug('hidden');
    logger.info('hidden');
    expect(log).not.toHaveBeenCalled();
    expect(logger.enabled('warn')).toBe(true);
    expect(logger.enabled('info')).toBe(false);
  });

  it('writes warnings as JSON lines with their fields', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    new Logger('debug').warn('Dataset missing', { file: 'sku_summary.csv' });

    expect(warn).toHaveBeenCalledTimes(1);
    const entry = lastEntry(warn);
    expect(entry.level).toBe('warn');
    expect(entry.message).toBe('Dataset missing');
    expect(entry.fields).toEqual({ file: 'sku_summary.csv' });
    expect(entry.component).toBeUndefined();
  });

  it('stamps scoped entries with their component', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => {});
    new Logger('debug').scoped('datasetLoader').info('Dataset loaded', { rows: 5 });

    const entry = lastEntry(log);
    expect(entry.component).toBe('datasetLoader');
    expect(entry.fields).toEqual({ rows: 5 });
  });

  it('sends errors to stderr and omits empty fields', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => {});
    new Logger('error').scoped('filterEngine').error('Primary table has no time keys', {});

    const entry = lastEntry(error);
    expect(entry.level).toBe('error');
    expect(entry.component).toBe('filterEngine');
    expect(entry.fields).toBeUndefined();
  });

  it('shares one root instance and scopes views of it', () => {
    expect(getLogger()).toBe(getLogger());
    expect(getLogger('kpi')).not.toBe(getLogger());
  });
});
