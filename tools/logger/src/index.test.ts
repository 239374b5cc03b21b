import { afterEach, describe, expect, test, vi } from 'vitest';

import { Logger, createConsoleLogger } from './index';

describe('Logger', () => {
  test('should expose the given methods', () => {
    const methods = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const logger = new Logger(methods);

    logger.info('hello', 1);

    expect(methods.info).toHaveBeenCalledWith('hello', 1);
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('should drop messages below the configured level', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = createConsoleLogger('warn');
    logger.debug('ignored');
    logger.warn('kept');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('kept');
  });

  test('silent level should drop errors too', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    createConsoleLogger('silent').error('ignored');

    expect(errorSpy).not.toHaveBeenCalled();
  });
});
