// ═══════════════════════════════════════════════════════════════
// Workforce Agents :: Logger
// Leveled line logger with an optional per-name log file
// ═══════════════════════════════════════════════════════════════

import fs from 'fs';
import path from 'path';
import { CONFIG, type LogLevel } from './config.js';
import type { LoggerHandle } from './types.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type RecordLevel = Exclude<LogLevel, 'silent'>;

export interface LoggerOptions {
  level?: LogLevel;
  dir?: string | null;
}

export function formatLine(name: string, level: RecordLevel, msg: string, meta?: Record<string, unknown>, at: Date = new Date()): string {
  const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${at.toISOString()} ${level.toUpperCase().padEnd(5)} [${name}] ${msg}${suffix}`;
}

export function createLogger(name: string, options: LoggerOptions = {}): LoggerHandle {
  const threshold = LEVEL_RANK[options.level ?? CONFIG.logging.level];
  const dir = options.dir === undefined ? CONFIG.logging.dir : options.dir;

  let file: string | null = null;
  if (dir) {
    try {
      fs.mkdirSync(dir, { recursive: true });
      file = path.join(dir, `${name}.log`);
    } catch (err) {
      console.warn(`Log directory unavailable (${dir}): ${String(err)}`);
    }
  }

  const write = (level: RecordLevel, msg: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_RANK[level] < threshold) return;
    const line = formatLine(name, level, msg, meta);

    if (level === 'error' || level === 'warn') console.error(line);
    else console.log(line);

    if (file) {
      try {
        fs.appendFileSync(file, line + '\n');
      } catch {
        // stop writing to a file that cannot be appended to
        file = null;
      }
    }
  };

  return {
    debug: (msg, meta) => write('debug', msg, meta),
    info: (msg, meta) => write('info', msg, meta),
    warn: (msg, meta) => write('warn', msg, meta),
    error: (msg, meta) => write('error', msg, meta),
  };
}
