import type Database from 'better-sqlite3';
import { z } from 'zod';
import { ConfigError } from './core/errors.js';
import { formatIssues } from './core/parameters.js';
import type { LifecycleConfig } from './core/types.js';
import { getConfigNumber, getConfigValue } from './db/repo.js';

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const settingsSchema = z.object({
  DB_PATH: z.string().min(1).default('reactor.db'),
  HOST: z.string().min(1).default('localhost'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  UPLOADS_DIR: z.string().min(1).default('uploads'),
  UPLOAD_MAX_FILE_SIZE_MB: z.coerce.number().positive().default(50),
  TRIES_TO_FAIL_EXPERIMENT: z.coerce.number().int().positive().default(3),
  EXPERIMENT_TIMEOUT_MINUTES: z.coerce.number().positive().default(15),
  RETRY_BACKOFF_BASE: z.coerce.number().min(1).default(2),
  AUTO_RETRY: flag.default('true'),
  SESSION_EXPIRY_HOURS: z.coerce.number().positive().default(24),
  SIMULATOR_COMMAND: z.string().min(1).optional(),
  DEFAULT_ADMIN_USERNAME: z.string().min(1).optional(),
  DEFAULT_ADMIN_PASSWORD: z.string().min(1).optional(),
});

export interface Settings {
  dbPath: string;
  host: string;
  port: number;
  uploadsDir: string;
  maxUploadBytes: number;
  maxTries: number;
  timeoutMinutes: number;
  backoffBase: number;
  autoRetry: boolean;
  sessionHours: number;
  simulatorCommand?: string;
  admin?: { username: string; password: string };
}

/** Read settings from the environment. Empty variables count as unset. */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''));
  const parsed = settingsSchema.safeParse(present);
  if (!parsed.success) throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
  const e = parsed.data;

  return {
    dbPath: e.DB_PATH,
    host: e.HOST,
    port: e.PORT,
    uploadsDir: e.UPLOADS_DIR,
    maxUploadBytes: Math.floor(e.UPLOAD_MAX_FILE_SIZE_MB * 1024 * 1024),
    maxTries: e.TRIES_TO_FAIL_EXPERIMENT,
    timeoutMinutes: e.EXPERIMENT_TIMEOUT_MINUTES,
    backoffBase: e.RETRY_BACKOFF_BASE,
    autoRetry: e.AUTO_RETRY,
    sessionHours: e.SESSION_EXPIRY_HOURS,
    simulatorCommand: e.SIMULATOR_COMMAND,
    admin:
      e.DEFAULT_ADMIN_USERNAME && e.DEFAULT_ADMIN_PASSWORD
        ? { username: e.DEFAULT_ADMIN_USERNAME, password: e.DEFAULT_ADMIN_PASSWORD }
        : undefined,
  };
}

/** Keys `reactorctl config set` accepts; they override the environment. */
export const LIFECYCLE_CONFIG_KEYS = ['max_tries', 'timeout_minutes', 'backoff_base', 'auto_retry'] as const;

/**
 * Merge the config table over the environment settings. Called once at
 * startup; the result is frozen for the life of the process.
 */
export function resolveLifecycleConfig(db: Database.Database, settings: Settings): Readonly<LifecycleConfig> {
  const maxTries = getConfigNumber(db, 'max_tries', settings.maxTries);
  const timeoutMinutes = getConfigNumber(db, 'timeout_minutes', settings.timeoutMinutes);
  const backoffBase = getConfigNumber(db, 'backoff_base', settings.backoffBase);
  const autoRetryRaw = getConfigValue(db, 'auto_retry');
  let autoRetry: boolean | undefined = settings.autoRetry;
  if (autoRetryRaw !== undefined) {
    const parsed = flag.safeParse(autoRetryRaw.trim());
    autoRetry = parsed.success ? parsed.data : undefined;
  }

  if (!Number.isInteger(maxTries) || maxTries < 1) {
    throw new ConfigError(`max_tries must be a positive integer, got ${maxTries}`);
  }
  if (!(timeoutMinutes > 0)) {
    throw new ConfigError(`timeout_minutes must be positive, got ${timeoutMinutes}`);
  }
  if (!(backoffBase >= 1)) {
    throw new ConfigError(`backoff_base must be at least 1, got ${backoffBase}`);
  }
  if (autoRetry === undefined) {
    throw new ConfigError(`auto_retry must be true or false, got "${autoRetryRaw}"`);
  }

  return Object.freeze({
    maxTries,
    timeoutMs: timeoutMinutes * 60_000,
    backoffBaseSec: backoffBase,
    autoRetry,
  });
}
