import type Database from 'better-sqlite3';
import { randomBytes, scryptSync, timingSafeEqual } from 'node:crypto';

export interface Session {
  token: string;
  expires_at: string;
}

export interface UserProfile {
  username: string;
  created_at: string;
}

const KEY_LENGTH = 64;

export function hashPassword(password: string): string {
  const salt = randomBytes(16).toString('hex');
  const hash = scryptSync(password, salt, KEY_LENGTH).toString('hex');
  return `${salt}:${hash}`;
}

export function verifyPassword(password: string, stored: string): boolean {
  const [salt, hash] = stored.split(':');
  if (!salt || !hash) return false;
  const expected = Buffer.from(hash, 'hex');
  const actual = scryptSync(password, salt, expected.length);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

export class UserRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly sessionHours: number,
    private readonly clock: () => Date = () => new Date()
  ) {}

  createUser(username: string, password: string): number {
    if (this.findUserId(username) !== undefined) {
      throw new Error(`User "${username}" already exists`);
    }
    const res = this.db
      .prepare('INSERT INTO users(username, password_hash, created_at) VALUES (?, ?, ?)')
      .run(username, hashPassword(password), this.clock().toISOString());
    return Number(res.lastInsertRowid);
  }

  /** Create the user unless it exists; returns its id either way. */
  ensureUser(username: string, password: string): number {
    return this.findUserId(username) ?? this.createUser(username, password);
  }

  findUserId(username: string): number | undefined {
    return this.db.prepare<[string], { id: number }>('SELECT id FROM users WHERE username=?').get(username)?.id;
  }

  authenticate(username: string, password: string): number | null {
    const row = this.db
      .prepare<[string], { id: number; password_hash: string }>('SELECT id, password_hash FROM users WHERE username=?')
      .get(username);
    if (!row) return null;
    return verifyPassword(password, row.password_hash) ? row.id : null;
  }

  createSession(userId: number): Session {
    const now = this.clock();
    const token = randomBytes(32).toString('base64url');
    const expiresAt = new Date(now.getTime() + this.sessionHours * 3600_000).toISOString();
    this.db
      .prepare('INSERT INTO sessions(user_id, token, created_at, expires_at) VALUES (?, ?, ?, ?)')
      .run(userId, token, now.toISOString(), expiresAt);
    return { token, expires_at: expiresAt };
  }

  getSessionUserId(token: string): number | null {
    const row = this.db
      .prepare<[string, string], { user_id: number }>('SELECT user_id FROM sessions WHERE token=? AND expires_at > ?')
      .get(token, this.clock().toISOString());
    return row?.user_id ?? null;
  }

  deleteSession(token: string): boolean {
    return this.db.prepare('DELETE FROM sessions WHERE token=?').run(token).changes > 0;
  }

  getProfile(userId: number): UserProfile | undefined {
    return this.db
      .prepare<[number], UserProfile>('SELECT username, created_at FROM users WHERE id=?')
      .get(userId);
  }

  cleanupExpiredSessions(): number {
    return this.db.prepare('DELETE FROM sessions WHERE expires_at <= ?').run(this.clock().toISOString()).changes;
  }
}
