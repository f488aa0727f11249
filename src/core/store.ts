import type { ExperimentJob, ExperimentStatus, NewExperiment } from './types.js';

/**
 * Durable experiment table. `commit` is the only write path for lifecycle
 * columns and must be a conditional update: it applies `next` only while the
 * stored row still has the status and version of `current`, and reports
 * whether it did.
 */
export interface JobStore {
  insert(input: NewExperiment, createdAt: string): ExperimentJob;
  get(id: number): ExperimentJob | undefined;
  listByOwner(owner: number): ExperimentJob[];
  /** Oldest `created_at` first, ties by id. */
  listByStatus(status: ExperimentStatus): ExperimentJob[];
  /**
   * Id-only queue scans, in the order `listByStatus` uses. The manager loads
   * each row itself so one unreadable row does not stall the sweep.
   */
  pendingIds(): number[];
  staleRunningIds(startedBefore: string): number[];
  dueRetryIds(now: string): number[];
  commit(next: ExperimentJob, current: ExperimentJob): boolean;
  countByStatus(): Record<ExperimentStatus, number>;
  oldestPending(): string | null;
}
