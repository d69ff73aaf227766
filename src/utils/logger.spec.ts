describe('#logger', () => {
  const originalLogLevel = process.env.LOG_LEVEL;

  afterAll(() => {
    if (originalLogLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLogLevel;
    }
  });

  it('should default to info and ignore LOG_LEVEL in the environment', () => {
    process.env.LOG_LEVEL = 'loud';

    jest.isolateModules(() => {
      const { getLogger } = jest.requireActual<typeof import('./logger')>('./logger');
      expect(getLogger().level).toBe('info');
    });
  });

  it('should apply setLogLevel to existing and later loggers', () => {
    jest.isolateModules(() => {
      const { getLogger, setLogLevel } =
        jest.requireActual<typeof import('./logger')>('./logger');
      const existing = getLogger();

      setLogLevel('warn');

      expect(existing.level).toBe('warn');
      expect(getLogger(module).level).toBe('warn');
    });
  });
});
