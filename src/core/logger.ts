/**
 * corpus-sync - Logging
 *
 * Engine components take a SyncLogger function. The CLI logs tagged lines to
 * stderr; the daemon appends timestamped lines to its log file.
 */

import { appendFileSync } from 'fs';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type SyncLogger = (level: LogLevel, message: string) => void;

export function createConsoleLogger(verbose = false): SyncLogger {
  return (level, message) => {
    if (level === 'DEBUG' && !verbose) return;
    const tag = level === 'INFO' ? '' : ` ${level.toLowerCase()}`;
    console.error(`[sync${tag}] ${message}`);
  };
}

export function formatLogLine(level: string, message: string, now: Date = new Date()): string {
  const timestamp = now.toISOString().replace('T', ' ').slice(0, 19);
  return `[${timestamp}] ${level.padEnd(5)} ${message}\n`;
}

export function createFileLogger(logFile: string, verbose = false): SyncLogger {
  return (level, message) => {
    if (level === 'DEBUG' && !verbose) return;
    appendFileSync(logFile, formatLogLine(level, message));
  };
}

export const silentLogger: SyncLogger = () => {};
