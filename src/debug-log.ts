// Debug log - append-only text file written while the terminal is in use
// Nothing may go to stdout/stderr during a round, so diagnostics land here

import * as fs from 'node:fs';
import * as path from 'node:path';

/** Debug log file path (temporary, cleared each session) */
export const DEBUG_LOG_PATH = path.join(process.cwd(), '.movepeek', 'debug.tmp.log');

export type DebugLogEntry = {
  type: 'key' | 'preview' | 'service' | 'round' | 'system';
  text: string;
  details?: Record<string, unknown>;
};

export interface DebugLogger {
  log(entry: DebugLogEntry): void;
}

/**
 * Logger that drops everything, used when --debug is off
 */
export const silentLogger: DebugLogger = {
  log() {},
};

/**
 * Formats one log entry as `[timestamp] [TYPE] text` plus indented details
 */
export function formatLogEntry(entry: DebugLogEntry, timestamp: Date = new Date()): string {
  let logLine = `[${timestamp.toISOString()}] [${entry.type.toUpperCase()}] ${entry.text}`;

  if (entry.details) {
    logLine += `\n    DETAILS: ${JSON.stringify(entry.details, null, 2).split('\n').join('\n    ')}`;
  }

  return `${logLine}\n`;
}

/**
 * Creates a file logger, truncating the file with a session header.
 * The first failed write disables the logger for the rest of the session.
 */
export function createFileLogger(filePath: string = DEBUG_LOG_PATH): DebugLogger {
  let enabled = true;

  function append(text: string, truncate: boolean): void {
    if (!enabled) return;
    try {
      const dir = path.dirname(filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      if (truncate) {
        fs.writeFileSync(filePath, text);
      } else {
        fs.appendFileSync(filePath, text);
      }
    } catch {
      enabled = false;
    }
  }

  append(`=== movepeek session ${new Date().toISOString()} ===\n\n`, true);

  return {
    log(entry) {
      append(formatLogEntry(entry), false);
    },
  };
}
