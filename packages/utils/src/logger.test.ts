import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, logger, setLogLevel } from './logger.js';

describe('setLogLevel', () => {
  afterEach(() => {
    setLogLevel('silent');
  });

  it('starts from LOG_LEVEL', () => {
    expect(logger.level).toBe('silent');
  });

  it('reaches child loggers created before the call', () => {
    const child = createLogger({ package: 'early' });

    setLogLevel('debug');

    expect(logger.level).toBe('debug');
    expect(child.level).toBe('debug');
  });

  it('leaves later children at the new level', () => {
    setLogLevel('warn');
    expect(createLogger({ package: 'late' }).level).toBe('warn');
  });
});
