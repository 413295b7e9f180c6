import type { Logging } from 'homebridge';
import { Logger } from 'homebridge/lib/logger';
import { CLIENT_NAME } from './settings';

/**
 * Prefixed console logger for the CLI. Library callers pass their own.
 */
export function createLogger(debug = false, prefix = CLIENT_NAME): Logging {
  Logger.setDebugEnabled(debug);
  return Logger.withPrefix(prefix);
}
