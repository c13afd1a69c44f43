import { appendFileSync, mkdirSync } from 'fs';
import path from 'path';

export type Log = (msg: string) => void;

/**
 * Appends timestamped lines to `logPath`. Never writes to the console: the
 * prompt owns the terminal while it is running.
 */
export function createLogger(logPath: string): Log {
  mkdirSync(path.dirname(logPath), { recursive: true });
  return (msg: string) => {
    const line = `[${new Date().toISOString()}] ${msg}`;
    appendFileSync(logPath, line + '\n');
  };
}
