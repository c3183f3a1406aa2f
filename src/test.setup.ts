// Shared test setup for Vitest
// Keep library logging quiet unless a test opts in with its own sink.
import { afterEach } from 'vitest';
import { LogLevel, logger } from './core/logger';

logger.level = LogLevel.OFF;

afterEach(() => {
  logger.level = LogLevel.OFF;
  logger.resetSink();
});
