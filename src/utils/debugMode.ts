/**
 * Debug Mode Utility
 *
 * Controls verbose sieve diagnostics. The flag is set from the loaded
 * config (DEBUG_MODE) at startup. Output goes through the shared logger,
 * so it lands on stderr and never mixes with the CLI verdict.
 */
import { logger } from './logger';

let debugMode = false;

export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

/**
 * Check if debug mode is enabled
 */
export function isDebugMode(): boolean {
  return debugMode;
}

/**
 * Log debug message only if debug mode is enabled
 * @param message Message or function that returns a message
 */
export function debugLog(message: string | (() => string)): void {
  if (!isDebugMode()) {
    return;
  }

  const msg = typeof message === 'function' ? message() : message;
  logger.info(`[DEBUG] ${msg}`);
}
