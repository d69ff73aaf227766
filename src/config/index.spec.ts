import { loadConfig } from './index';

describe('#loadConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.LOG_LEVEL;
    delete process.env.DEBUG_MODE;
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should default to info logging with debug mode off', () => {
    expect(loadConfig()).toEqual({ logLevel: 'info', debugMode: false });
  });

  it('should read LOG_LEVEL and DEBUG_MODE', () => {
    process.env.LOG_LEVEL = 'debug';
    process.env.DEBUG_MODE = 'true';

    expect(loadConfig()).toEqual({ logLevel: 'debug', debugMode: true });
  });

  it('should only enable debug mode for the exact value true', () => {
    process.env.DEBUG_MODE = '1';

    expect(loadConfig().debugMode).toBe(false);
  });

  it('should reject an unknown log level', () => {
    process.env.LOG_LEVEL = 'loud';

    expect(() => loadConfig()).toThrow(
      'LOG_LEVEL must be one of error, warn, info, http, verbose, debug, silly, got "loud"'
    );
  });
});
