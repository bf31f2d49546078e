// ═══════════════════════════════════════════════════════════════
// Store :: SQLite Connection
// ═══════════════════════════════════════════════════════════════

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { LoggerHandle } from '../core/types.js';

export function openDatabase(file: string, logger: LoggerHandle): Database.Database {
  if (file !== ':memory:') {
    fs.mkdirSync(path.dirname(file), { recursive: true });
  }
  const db = new Database(file);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  logger.info(`Database opened: ${file}`);
  return db;
}
