import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';

const DEFAULT_LOG_PATH = '.lowfloat/logs/screen.log';

export interface LogEntry {
  ts: string;
  scope: string;
  message: string;
  data?: unknown;
}

// Resolved per call so LOW_FLOAT_LOG_PATH can be set after import (tests, cli).
export function getLogPath(): string {
  return resolve(process.env.LOW_FLOAT_LOG_PATH ?? DEFAULT_LOG_PATH);
}

function ensureLogDir(logPath: string): void {
  const dir = dirname(logPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function logToFile(scope: string, message: string, data?: unknown): void {
  if (process.env.LOW_FLOAT_LOG_DISABLED === '1') return;
  try {
    const logPath = getLogPath();
    ensureLogDir(logPath);
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      scope,
      message,
      data,
    };
    appendFileSync(logPath, `${JSON.stringify(entry)}\n`);
  } catch {
    // Avoid throwing from logging paths.
  }
}
