import type Database from 'better-sqlite3';
import { LIFECYCLE_CONFIG_KEYS } from '../config.js';
import { setConfig } from '../db/repo.js';

interface ConfigRow {
  key: string;
  value: string;
}

export function getConfigAll(db: Database.Database) {
  const rows = db.prepare<[], ConfigRow>('SELECT key, value FROM config ORDER BY key').all();
  const res: Record<string, string | number> = {};

  for (const row of rows) {
    const num = Number(row.value);
    res[row.key] = isNaN(num) ? row.value : num;
  }

  return res;
}

/** Takes effect the next time a process starts. */
export function setConfigKV(db: Database.Database, key: string, value: string) {
  if (!LIFECYCLE_CONFIG_KEYS.some((k) => k === key)) {
    throw new Error(`Unknown config key "${key}" (expected one of: ${LIFECYCLE_CONFIG_KEYS.join(', ')})`);
  }
  setConfig(db, key, value);
}
