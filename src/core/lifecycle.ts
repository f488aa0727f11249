import { CorruptRecordError } from './errors.js';
import type { JobStore } from './store.js';
import type {
  CompletedExperiment,
  ExperimentBase,
  ExperimentJob,
  ExperimentStatus,
  FailedExperiment,
  LifecycleConfig,
  Logger,
  NewExperiment,
  PendingExperiment,
  PermanentlyFailedExperiment,
  RunningExperiment,
  SimulationResults,
} from './types.js';

export type LifecycleEvent =
  | { type: 'claim' }
  | { type: 'succeed'; results: SimulationResults }
  | { type: 'fail'; message: string }
  | { type: 'timeout' }
  | { type: 'retry'; requester: number }
  | { type: 'requeue' };

export type RejectionReason = 'forbidden' | 'not_retryable' | 'stale' | 'not_due' | 'illegal_transition';

export type Transition =
  | { ok: true; job: ExperimentJob }
  | { ok: false; reason: RejectionReason; message: string };

export interface TransitionContext {
  now: Date;
  config: LifecycleConfig;
}

export function isStale(job: RunningExperiment, now: Date, config: LifecycleConfig) {
  return now.getTime() - Date.parse(job.started_at) > config.timeoutMs;
}

function base(job: ExperimentJob, now: string, tries = job.tries): ExperimentBase {
  return {
    id: job.id,
    version: job.version + 1,
    owner: job.owner,
    experiment_name: job.experiment_name,
    tries,
    created_at: job.created_at,
    updated_at: now,
    parameters: job.parameters,
    input_series: job.input_series,
  };
}

function toPending(job: ExperimentJob, now: string, tries = job.tries): PendingExperiment {
  return {
    ...base(job, now, tries),
    status: 'pending',
    started_at: null,
    completed_at: null,
    retry_at: null,
    results: null,
    error_message: null,
  };
}

function toFailed(
  job: RunningExperiment,
  now: Date,
  tries: number,
  message: string,
  config: LifecycleConfig
): FailedExperiment | PermanentlyFailedExperiment {
  const iso = now.toISOString();
  if (tries >= config.maxTries) return toPermanentlyFailed(job, iso, tries, message);
  const retryAt = config.autoRetry
    ? new Date(now.getTime() + Math.pow(config.backoffBaseSec, tries) * 1000).toISOString()
    : null;
  return {
    ...base(job, iso, tries),
    status: 'failed',
    started_at: null,
    completed_at: null,
    retry_at: retryAt,
    results: null,
    error_message: message,
  };
}

function toPermanentlyFailed(
  job: ExperimentJob,
  now: string,
  tries: number,
  message: string
): PermanentlyFailedExperiment {
  return {
    ...base(job, now, tries),
    status: 'failed_permanently',
    started_at: null,
    completed_at: null,
    retry_at: null,
    results: null,
    error_message: message,
  };
}

const NOT_RETRYABLE: Record<Exclude<ExperimentStatus, 'failed'>, string> = {
  pending: 'Experiment is already pending',
  running: 'Experiment is currently running',
  completed: 'Experiment is already completed',
  failed_permanently: 'Experiment cannot be retried - permanently failed',
};

function reject(reason: RejectionReason, message: string): Transition {
  return { ok: false, reason, message };
}

/**
 * The experiment state machine. Pure: computes the next record (with its
 * version bumped) or a rejection, and never touches the store.
 */
export function transition(job: ExperimentJob, event: LifecycleEvent, ctx: TransitionContext): Transition {
  const { now, config } = ctx;
  const iso = now.toISOString();

  switch (event.type) {
    case 'claim': {
      if (job.status !== 'pending') return reject('illegal_transition', `Cannot claim a ${job.status} experiment`);
      // max_tries may have been lowered since this job was queued
      if (job.tries >= config.maxTries) {
        return {
          ok: true,
          job: toPermanentlyFailed(job, iso, job.tries, `Experiment failed after ${job.tries} attempts`),
        };
      }
      const running: RunningExperiment = {
        ...base(job, iso),
        status: 'running',
        started_at: iso,
        completed_at: null,
        retry_at: null,
        results: null,
        error_message: null,
      };
      return { ok: true, job: running };
    }

    case 'succeed': {
      if (job.status !== 'running') return reject('illegal_transition', `Cannot complete a ${job.status} experiment`);
      if (isStale(job, now, config)) return reject('stale', 'Experiment exceeded its timeout');
      const completed: CompletedExperiment = {
        ...base(job, iso),
        status: 'completed',
        started_at: job.started_at,
        completed_at: iso,
        retry_at: null,
        results: event.results,
        error_message: null,
      };
      return { ok: true, job: completed };
    }

    case 'fail': {
      if (job.status !== 'running') return reject('illegal_transition', `Cannot fail a ${job.status} experiment`);
      if (isStale(job, now, config)) return reject('stale', 'Experiment exceeded its timeout');
      return { ok: true, job: toFailed(job, now, job.tries + 1, event.message, config) };
    }

    case 'timeout': {
      if (job.status !== 'running') return reject('illegal_transition', `Cannot time out a ${job.status} experiment`);
      if (!isStale(job, now, config)) return reject('illegal_transition', 'Experiment is within its timeout');
      const tries = job.tries + 1;
      if (tries >= config.maxTries) {
        return { ok: true, job: toPermanentlyFailed(job, iso, tries, `Experiment timed out after ${tries} attempts`) };
      }
      return { ok: true, job: toPending(job, iso, tries) };
    }

    case 'retry': {
      if (event.requester !== job.owner) return reject('forbidden', 'Access denied');
      if (job.status !== 'failed') return reject('not_retryable', NOT_RETRYABLE[job.status]);
      return { ok: true, job: toPending(job, iso) };
    }

    case 'requeue': {
      if (job.status !== 'failed') return reject('illegal_transition', `Cannot requeue a ${job.status} experiment`);
      if (!config.autoRetry || job.retry_at === null || Date.parse(job.retry_at) > now.getTime()) {
        return reject('not_due', 'Experiment is not due for automatic retry');
      }
      return { ok: true, job: toPending(job, iso) };
    }
  }
}

export type SettleOutcome = 'completed' | 'failed' | 'failed_permanently' | 'reclaimed' | 'lost';

export type RetryResult =
  | { ok: true; job: ExperimentJob }
  | { ok: false; reason: 'not_found' | 'forbidden' | 'not_retryable'; message: string };

export interface StatusSummary {
  counts: Record<ExperimentStatus, number>;
  oldestPending: string | null;
}

/**
 * Applies lifecycle events to stored experiments. Every write goes through
 * `JobStore.commit`, so a transition computed from a snapshot that another
 * process has since changed is dropped rather than applied.
 */
export class LifecycleManager {
  constructor(
    private readonly store: JobStore,
    readonly config: LifecycleConfig,
    private readonly clock: () => Date = () => new Date(),
    private readonly logger: Logger = console
  ) {}

  create(input: NewExperiment): ExperimentJob {
    return this.store.insert(input, this.clock().toISOString());
  }

  get(id: number) {
    return this.store.get(id);
  }

  list(owner: number) {
    return this.store.listByOwner(owner);
  }

  listByStatus(status: ExperimentStatus) {
    return this.store.listByStatus(status);
  }

  summary(): StatusSummary {
    return { counts: this.store.countByStatus(), oldestPending: this.store.oldestPending() };
  }

  /** Pending → running. Returns null when another claimant got there first. */
  claim(id: number): RunningExperiment | null {
    const job = this.store.get(id);
    if (!job || job.status !== 'pending') return null;
    return this.claimJob(job);
  }

  claimNext(): RunningExperiment | null {
    for (const id of this.store.pendingIds()) {
      const job = this.load(id);
      if (!job || job.status !== 'pending') continue;
      const claimed = this.claimJob(job);
      if (claimed) return claimed;
    }
    return null;
  }

  complete(job: RunningExperiment, results: SimulationResults): SettleOutcome {
    return this.settle(job, { type: 'succeed', results });
  }

  fail(job: RunningExperiment, message: string): SettleOutcome {
    return this.settle(job, { type: 'fail', message });
  }

  /** Feed every running job past its deadline through the timeout transition. */
  reclaimStale(): ExperimentJob[] {
    const now = this.clock();
    const cutoff = new Date(now.getTime() - this.config.timeoutMs).toISOString();
    const reclaimed: ExperimentJob[] = [];
    for (const id of this.store.staleRunningIds(cutoff)) {
      const job = this.load(id);
      if (!job) continue;
      const next = this.apply(job, { type: 'timeout' }, now);
      if (!next) continue;
      reclaimed.push(next);
      if (next.status === 'pending') {
        this.logger.warn(
          `[lifecycle] experiment ${job.id} timed out; back to pending (try ${next.tries}/${this.config.maxTries})`
        );
      } else {
        this.logger.error(`[lifecycle] experiment ${job.id} timed out and is permanently failed`);
      }
    }
    return reclaimed;
  }

  /** Automatic retry: failed jobs whose backoff has elapsed go back to pending. */
  requeueDue(): ExperimentJob[] {
    if (!this.config.autoRetry) return [];
    const now = this.clock();
    const requeued: ExperimentJob[] = [];
    for (const id of this.store.dueRetryIds(now.toISOString())) {
      const job = this.load(id);
      if (!job) continue;
      const next = this.apply(job, { type: 'requeue' }, now);
      if (next) requeued.push(next);
    }
    if (requeued.length > 0) this.logger.log(`[lifecycle] requeued ${requeued.length} failed experiment(s)`);
    return requeued;
  }

  retry(id: number, requester: number): RetryResult {
    let job = this.store.get(id);
    if (!job) return { ok: false, reason: 'not_found', message: 'Experiment not found' };
    if (job.owner !== requester) return { ok: false, reason: 'forbidden', message: 'Access denied' };

    const now = this.clock();
    if (job.status === 'running' && isStale(job, now, this.config)) {
      job = this.apply(job, { type: 'timeout' }, now) ?? this.store.get(id) ?? job;
    }

    const t = transition(job, { type: 'retry', requester }, { now, config: this.config });
    if (!t.ok) {
      return { ok: false, reason: t.reason === 'forbidden' ? 'forbidden' : 'not_retryable', message: t.message };
    }
    if (!this.store.commit(t.job, job)) {
      return { ok: false, reason: 'not_retryable', message: 'Experiment changed while retrying' };
    }
    return { ok: true, job: t.job };
  }

  /** Corrupt rows are logged and skipped so the rest of the queue keeps moving. */
  private load(id: number): ExperimentJob | undefined {
    try {
      return this.store.get(id);
    } catch (err) {
      if (!(err instanceof CorruptRecordError)) throw err;
      this.logger.error(`[lifecycle] skipping experiment ${id}: ${err.message}`);
      return undefined;
    }
  }

  private claimJob(job: PendingExperiment): RunningExperiment | null {
    const next = this.apply(job, { type: 'claim' }, this.clock());
    if (!next) return null;
    if (next.status === 'running') return next;
    this.logger.error(`[lifecycle] experiment ${job.id} marked as permanently failed (exceeded ${this.config.maxTries} tries)`);
    return null;
  }

  private settle(job: RunningExperiment, event: LifecycleEvent): SettleOutcome {
    const now = this.clock();
    const t = transition(job, event, { now, config: this.config });
    if (!t.ok) {
      if (t.reason !== 'stale') return 'lost';
      return this.apply(job, { type: 'timeout' }, now) ? 'reclaimed' : 'lost';
    }
    if (!this.store.commit(t.job, job)) return 'lost';
    const status = t.job.status;
    return status === 'completed' || status === 'failed' || status === 'failed_permanently' ? status : 'lost';
  }

  private apply(job: ExperimentJob, event: LifecycleEvent, now: Date): ExperimentJob | null {
    const t = transition(job, event, { now, config: this.config });
    if (!t.ok) return null;
    return this.store.commit(t.job, job) ? t.job : null;
  }
}
