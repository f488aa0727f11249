import type Database from 'better-sqlite3';
import { CorruptRecordError } from '../core/errors.js';
import { reactorParametersSchema } from '../core/parameters.js';
import { simulationResultsSchema } from '../core/simulator.js';
import type { JobStore } from '../core/store.js';
import {
  EXPERIMENT_STATUSES,
  type ExperimentJob,
  type ExperimentStatus,
  type NewExperiment,
  type ReactorParameters,
  type SimulationResults,
} from '../core/types.js';

interface ExperimentRow {
  id: number;
  version: number;
  owner: number;
  experiment_name: string;
  status: string;
  tries: number;
  created_at: string;
  updated_at: string;
  started_at: string | null;
  completed_at: string | null;
  retry_at: string | null;
  parameters_json: string;
  input_series: string;
  results_json: string | null;
  error_message: string | null;
}

interface CommitParams {
  id: number;
  version: number;
  status: ExperimentStatus;
  tries: number;
  updated_at: string;
  started_at: string | null;
  completed_at: string | null;
  retry_at: string | null;
  results_json: string | null;
  error_message: string | null;
  expected_status: ExperimentStatus;
  expected_version: number;
}

function parseJson(id: number, column: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new CorruptRecordError(id, `${column} is not valid JSON`);
  }
}

function parseParameters(row: ExperimentRow): ReactorParameters {
  const parsed = reactorParametersSchema.safeParse(parseJson(row.id, 'parameters_json', row.parameters_json));
  if (!parsed.success) throw new CorruptRecordError(row.id, 'parameters do not validate');
  return parsed.data;
}

function parseResults(row: ExperimentRow): SimulationResults {
  if (row.results_json === null) throw new CorruptRecordError(row.id, 'completed without results');
  const parsed = simulationResultsSchema.safeParse(parseJson(row.id, 'results_json', row.results_json));
  if (!parsed.success) throw new CorruptRecordError(row.id, 'results do not validate');
  return parsed.data;
}

function required<T>(row: ExperimentRow, column: string, value: T | null): T {
  if (value === null) throw new CorruptRecordError(row.id, `${row.status} without ${column}`);
  return value;
}

/**
 * Map a row onto the status-discriminated job type. Columns that must be
 * set for the row's status are checked; the rest are normalised to null.
 */
export function rowToJob(row: ExperimentRow): ExperimentJob {
  const base = {
    id: row.id,
    version: row.version,
    owner: row.owner,
    experiment_name: row.experiment_name,
    tries: row.tries,
    created_at: row.created_at,
    updated_at: row.updated_at,
    parameters: parseParameters(row),
    input_series: row.input_series,
  };
  const cleared = { started_at: null, completed_at: null, retry_at: null, results: null, error_message: null };

  switch (row.status) {
    case 'pending':
      return { ...base, ...cleared, status: 'pending' };
    case 'running':
      return { ...base, ...cleared, status: 'running', started_at: required(row, 'started_at', row.started_at) };
    case 'completed':
      return {
        ...base,
        ...cleared,
        status: 'completed',
        started_at: row.started_at,
        completed_at: required(row, 'completed_at', row.completed_at),
        results: parseResults(row),
      };
    case 'failed':
      return {
        ...base,
        ...cleared,
        status: 'failed',
        retry_at: row.retry_at,
        error_message: required(row, 'error_message', row.error_message),
      };
    case 'failed_permanently':
      return {
        ...base,
        ...cleared,
        status: 'failed_permanently',
        error_message: required(row, 'error_message', row.error_message),
      };
    default:
      throw new CorruptRecordError(row.id, `unknown status "${row.status}"`);
  }
}

export class SqliteJobStore implements JobStore {
  constructor(private readonly db: Database.Database) {}

  insert(input: NewExperiment, createdAt: string): ExperimentJob {
    const row = this.db
      .prepare<[string, number, string, string, string, string], ExperimentRow>(
        `
        INSERT INTO experiments(
          experiment_name, owner, parameters_json, input_series, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?)
        RETURNING *
      `
      )
      .get(
        input.experiment_name,
        input.owner,
        JSON.stringify(input.parameters),
        input.input_series,
        createdAt,
        createdAt
      );
    if (!row) throw new Error('Failed to create experiment - no row returned');
    return rowToJob(row);
  }

  get(id: number): ExperimentJob | undefined {
    const row = this.db.prepare<[number], ExperimentRow>('SELECT * FROM experiments WHERE id=?').get(id);
    return row ? rowToJob(row) : undefined;
  }

  listByOwner(owner: number): ExperimentJob[] {
    return this.db
      .prepare<[number], ExperimentRow>('SELECT * FROM experiments WHERE owner=? ORDER BY created_at ASC, id ASC')
      .all(owner)
      .map(rowToJob);
  }

  listByStatus(status: ExperimentStatus): ExperimentJob[] {
    return this.db
      .prepare<[string], ExperimentRow>('SELECT * FROM experiments WHERE status=? ORDER BY created_at ASC, id ASC')
      .all(status)
      .map(rowToJob);
  }

  pendingIds(): number[] {
    return this.db
      .prepare<[], { id: number }>("SELECT id FROM experiments WHERE status='pending' ORDER BY created_at ASC, id ASC")
      .all()
      .map((r) => r.id);
  }

  staleRunningIds(startedBefore: string): number[] {
    return this.db
      .prepare<[string], { id: number }>(
        `
        SELECT id FROM experiments
        WHERE status='running' AND started_at < ?
        ORDER BY started_at ASC, id ASC
      `
      )
      .all(startedBefore)
      .map((r) => r.id);
  }

  dueRetryIds(now: string): number[] {
    return this.db
      .prepare<[string], { id: number }>(
        `
        SELECT id FROM experiments
        WHERE status='failed' AND retry_at IS NOT NULL AND retry_at <= ?
        ORDER BY created_at ASC, id ASC
      `
      )
      .all(now)
      .map((r) => r.id);
  }

  /**
   * Compare-and-swap on (status, version). Two claimants racing on the same
   * pending row both read version N; only the first UPDATE still matches.
   */
  commit(next: ExperimentJob, current: ExperimentJob): boolean {
    const res = this.db
      .prepare<CommitParams>(
        `
        UPDATE experiments SET
          version=@version, status=@status, tries=@tries, updated_at=@updated_at,
          started_at=@started_at, completed_at=@completed_at, retry_at=@retry_at,
          results_json=@results_json, error_message=@error_message
        WHERE id=@id AND status=@expected_status AND version=@expected_version
      `
      )
      .run({
        id: next.id,
        version: next.version,
        status: next.status,
        tries: next.tries,
        updated_at: next.updated_at,
        started_at: next.started_at,
        completed_at: next.completed_at,
        retry_at: next.retry_at,
        results_json: next.results === null ? null : JSON.stringify(next.results),
        error_message: next.error_message,
        expected_status: current.status,
        expected_version: current.version,
      });
    return res.changes === 1;
  }

  countByStatus(): Record<ExperimentStatus, number> {
    const rows = this.db
      .prepare<[], { status: string; c: number }>('SELECT status, COUNT(*) as c FROM experiments GROUP BY status')
      .all();
    const res: Record<ExperimentStatus, number> = {
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
      failed_permanently: 0,
    };
    for (const row of rows) {
      const status = EXPERIMENT_STATUSES.find((s) => s === row.status);
      if (status) res[status] = row.c;
    }
    return res;
  }

  oldestPending(): string | null {
    const row = this.db
      .prepare<[], { m: string | null }>("SELECT MIN(created_at) as m FROM experiments WHERE status='pending'")
      .get();
    return row?.m ?? null;
  }
}

/**
 * Retrieve a config value as a number
 */
export function getConfigNumber(db: Database.Database, key: string, def: number) {
  const value = getConfigValue(db, key);
  if (value === undefined) return def;
  const n = Number(value);
  return Number.isFinite(n) ? n : def;
}

export function getConfigValue(db: Database.Database, key: string): string | undefined {
  const row = db.prepare<[string], { value: string }>('SELECT value FROM config WHERE key=?').get(key);
  return row?.value;
}

/**
 * Set or update a config key/value pair
 */
export function setConfig(db: Database.Database, key: string, value: string) {
  db.prepare(`
    INSERT INTO config(key, value)
    VALUES (?, ?)
    ON CONFLICT(key)
    DO UPDATE SET value = excluded.value
  `).run(key, value);
}
