/**
 * Run Logger
 *
 * Timestamped log lines go to stderr (so stdout stays free for the run
 * summary) and are appended to a persistent log file for post-hoc inspection.
 */

import * as fs from 'fs';
import * as path from 'path';
import { hasMessage } from '../core/errors';

export interface LoggingOptions {
  /** Log file path, or null to disable file logging */
  file?: string | null;
  /** Echo log lines to stderr */
  stderr?: boolean;
}

let logFile: string | null = null;
let echoToStderr = true;

/**
 * Configure where log lines go. Creates the log file's directory if needed.
 */
export function configureLogging(options: LoggingOptions): void {
  if (options.stderr !== undefined) {
    echoToStderr = options.stderr;
  }

  if (options.file !== undefined) {
    logFile = options.file;
    if (logFile) {
      const dir = path.dirname(logFile);
      try {
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      } catch (error) {
        console.error('[doc-translator] Failed to create log directory:', error);
      }
    }
  }
}

/**
 * Format a log line. Extra arguments are appended as JSON.
 */
export function formatLogLine(message: string, args: unknown[], now: Date = new Date()): string {
  const formattedMessage = `[${now.toISOString()}] ${message}`;
  return args.length > 0
    ? `${formattedMessage} ${args.map(a => JSON.stringify(a)).join(' ')}`
    : formattedMessage;
}

/**
 * Log to stderr and file
 */
export function log(message: string, ...args: unknown[]): void {
  const fullMessage = formatLogLine(message, args);

  if (echoToStderr) {
    console.error(fullMessage);
  }

  if (logFile) {
    try {
      fs.appendFileSync(logFile, fullMessage + '\n', 'utf-8');
    } catch (error) {
      // A broken log file must not fail the run
      console.error('[doc-translator] Failed to write to log file:', error);
    }
  }
}

/**
 * Message text of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return hasMessage(error) ? error.message : String(error);
}
