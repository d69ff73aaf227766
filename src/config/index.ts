import dotenv from 'dotenv';
import { CliConfig, LogLevel } from '../types';

dotenv.config();

export const LOG_LEVELS: readonly LogLevel[] = [
  'error',
  'warn',
  'info',
  'http',
  'verbose',
  'debug',
  'silly',
];

function getEnvVarWithDefault(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function loadConfig(): CliConfig {
  const logLevel = getEnvVarWithDefault('LOG_LEVEL', 'info');

  if (!isLogLevel(logLevel)) {
    throw new Error(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`
    );
  }

  return {
    logLevel,
    debugMode: getEnvVarWithDefault('DEBUG_MODE', 'false') === 'true',
  };
}
