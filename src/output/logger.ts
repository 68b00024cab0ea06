/**
 * File logging with ANSI stripping
 */

import * as fs from 'fs';
import * as path from 'path';

import { stripAnsi } from './colors.js';

/**
 * Compile event for structured logging
 */
export interface CompileEvent {
  type: 'compile';
  event: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface Logger {
  log(msg: string): void;
  logEvent(event: Omit<CompileEvent, 'type' | 'timestamp'>): void;
  filePath: string | null;
}

/**
 * Create a logger that writes to a timestamped log file
 */
export function createLogger(
  enabled: boolean,
  logDir: string,
  inputName: string
): Logger {
  if (!enabled) {
    return {
      log: () => undefined,
      logEvent: () => undefined,
      filePath: null,
    };
  }

  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  const sanitizedName = path.basename(inputName).replace(/[^\w.-]/g, '_');
  const logFile = path.join(logDir, `${sanitizedName}-${timestamp}.log`);

  return {
    log(msg: string): void {
      fs.appendFileSync(logFile, stripAnsi(msg) + '\n');
    },
    logEvent(eventData: Omit<CompileEvent, 'type' | 'timestamp'>): void {
      const fullEvent = {
        type: 'compile' as const,
        timestamp: new Date().toISOString(),
        ...eventData,
      };
      fs.appendFileSync(logFile, JSON.stringify(fullEvent) + '\n');
    },
    filePath: logFile,
  };
}
