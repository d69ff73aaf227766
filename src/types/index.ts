export type LogLevel =
  | 'error'
  | 'warn'
  | 'info'
  | 'http'
  | 'verbose'
  | 'debug'
  | 'silly';

export interface CliConfig {
  logLevel: LogLevel;
  debugMode: boolean;
}

// Parsed command line: the single value to test for primality.
export interface CliArgs {
  target: number;
}
