import { loadSettings } from '../config.js';
import { getDB } from '../db/db.js';
import { createRuntime, type Runtime } from '../runtime.js';

export function openRuntime(): Runtime {
  const settings = loadSettings();
  return createRuntime(getDB(settings.dbPath), settings);
}

export function requireUserId(rt: Runtime, username: string): number {
  const id = rt.users.findUserId(username);
  if (id === undefined) throw new Error(`Unknown user "${username}"`);
  return id;
}
