jest.mock('./logger', () => {
  const logger = { info: jest.fn() };
  return { logger, getLogger: () => logger };
});

import { debugLog, isDebugMode, setDebugMode } from './debugMode';
import { logger } from './logger';

describe('#debugMode', () => {
  const originalDebugMode = process.env.DEBUG_MODE;

  beforeEach(() => {
    jest.clearAllMocks();
    setDebugMode(false);
  });

  afterAll(() => {
    setDebugMode(false);
    if (originalDebugMode === undefined) {
      delete process.env.DEBUG_MODE;
    } else {
      process.env.DEBUG_MODE = originalDebugMode;
    }
  });

  it('should stay silent unless debug mode is enabled', () => {
    const message = jest.fn(() => 'expensive');

    debugLog(message);

    expect(isDebugMode()).toBe(false);
    expect(message).not.toHaveBeenCalled();
    expect(logger.info).not.toHaveBeenCalled();
  });

  it('should log lazily built messages in debug mode', () => {
    setDebugMode(true);

    debugLog(() => 'Sieve: 4 primes up to 10');
    debugLog('plain');

    expect(logger.info).toHaveBeenNthCalledWith(1, '[DEBUG] Sieve: 4 primes up to 10');
    expect(logger.info).toHaveBeenNthCalledWith(2, '[DEBUG] plain');
  });

  it('should follow the config flag rather than the environment', () => {
    process.env.DEBUG_MODE = 'true';

    debugLog('ignored');

    expect(isDebugMode()).toBe(false);
    expect(logger.info).not.toHaveBeenCalled();
  });
});
