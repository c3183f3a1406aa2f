import { describe, expect, it, vi } from 'vitest';
import { LOG_LEVEL_NAMES, LogLevel, logger } from './logger';

function captureSink() {
  const sink = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
  logger.setSink(sink);
  return sink;
}

describe('logger', () => {
  it('prefixes lines with the category and passes extra args through', () => {
    const sink = captureSink();
    logger.level = LogLevel.DEBUG;
    logger.debug('PARSE', 'tokens', 3);
    expect(sink.debug).toHaveBeenCalledWith('[PARSE] tokens', 3);
  });

  it('drops messages more verbose than the level', () => {
    const sink = captureSink();
    logger.level = LogLevel.WARN;
    logger.info('LOADER', 'hidden');
    logger.warn('LOADER', 'shown');
    logger.error('LOADER', 'shown too');
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledTimes(1);
    expect(sink.error).toHaveBeenCalledTimes(1);
  });

  it('is silent when OFF', () => {
    const sink = captureSink();
    logger.level = LogLevel.OFF;
    logger.error('STORE', 'nothing');
    expect(sink.error).not.toHaveBeenCalled();
    expect(LOG_LEVEL_NAMES[logger.level]).toBe('OFF');
  });
});
