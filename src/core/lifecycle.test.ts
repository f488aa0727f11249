import assert from 'node:assert/strict';
import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import test from 'node:test';
import { openDatabase } from '../db/db.js';
import { SqliteJobStore } from '../db/repo.js';
import { LifecycleManager, transition, type LifecycleEvent } from './lifecycle.js';
import {
  silentLogger,
  type ExperimentJob,
  type FailedExperiment,
  type LifecycleConfig,
  type PendingExperiment,
  type RunningExperiment,
} from './types.js';

const T0 = new Date('2025-03-01T10:00:00.000Z');
const MINUTE = 60_000;

const config: LifecycleConfig = { maxTries: 3, timeoutMs: 15 * MINUTE, backoffBaseSec: 2, autoRetry: true };

function at(offsetMs: number) {
  return new Date(T0.getTime() + offsetMs);
}

function pendingJob(overrides: Partial<PendingExperiment> = {}): PendingExperiment {
  return {
    id: 1,
    version: 0,
    owner: 7,
    experiment_name: 'batch-a',
    tries: 0,
    created_at: T0.toISOString(),
    updated_at: T0.toISOString(),
    parameters: { dt: 0.5 },
    input_series: '/uploads/a.tsv',
    status: 'pending',
    started_at: null,
    completed_at: null,
    retry_at: null,
    results: null,
    error_message: null,
    ...overrides,
  };
}

function runningJob(overrides: Partial<RunningExperiment> = {}): RunningExperiment {
  return {
    ...pendingJob(),
    version: 1,
    status: 'running',
    started_at: T0.toISOString(),
    ...overrides,
  };
}

function failedJob(overrides: Partial<FailedExperiment> = {}): FailedExperiment {
  return {
    ...pendingJob(),
    version: 2,
    tries: 1,
    status: 'failed',
    retry_at: at(2000).toISOString(),
    error_message: 'diverged',
    ...overrides,
  };
}

function accepted(job: ExperimentJob, event: LifecycleEvent, now = T0, cfg = config): ExperimentJob {
  const t = transition(job, event, { now, config: cfg });
  assert.ok(t.ok, t.ok ? '' : t.message);
  return t.job;
}

test('claim moves pending to running without touching tries', () => {
  const next = accepted(pendingJob({ tries: 1 }), { type: 'claim' }, at(5000));
  assert.equal(next.status, 'running');
  assert.equal(next.started_at, at(5000).toISOString());
  assert.equal(next.tries, 1);
  assert.equal(next.version, 1);
});

test('claim of a job that already used up its tries marks it permanently failed', () => {
  const next = accepted(pendingJob({ tries: 3 }), { type: 'claim' });
  assert.equal(next.status, 'failed_permanently');
  assert.equal(next.error_message, 'Experiment failed after 3 attempts');
  assert.equal(next.tries, 3);
});

test('claim of a running job is rejected', () => {
  const t = transition(runningJob(), { type: 'claim' }, { now: T0, config });
  assert.deepEqual(t, { ok: false, reason: 'illegal_transition', message: 'Cannot claim a running experiment' });
});

test('success stores results and completion time', () => {
  const results = { time: [0, 1], reactor_temperature: [300, 301.5] };
  const next = accepted(runningJob(), { type: 'succeed', results }, at(MINUTE));
  assert.equal(next.status, 'completed');
  assert.deepEqual(next.results, results);
  assert.equal(next.completed_at, at(MINUTE).toISOString());
  assert.equal(next.started_at, T0.toISOString());
  assert.equal(next.error_message, null);
  assert.equal(next.tries, 0);
});

test('failure below max_tries goes to failed with a backoff', () => {
  const next = accepted(runningJob(), { type: 'fail', message: 'diverged' }, at(MINUTE));
  assert.equal(next.status, 'failed');
  assert.equal(next.tries, 1);
  assert.equal(next.error_message, 'diverged');
  assert.equal(next.started_at, null);
  assert.equal(next.results, null);
  // 2^1 seconds
  assert.equal(next.retry_at, at(MINUTE + 2000).toISOString());
});

test('failure without automatic retry leaves retry_at unset', () => {
  const next = accepted(runningJob(), { type: 'fail', message: 'diverged' }, T0, { ...config, autoRetry: false });
  assert.equal(next.status, 'failed');
  assert.equal(next.retry_at, null);
});

test('the max_tries-th failure is permanent', () => {
  const next = accepted(runningJob({ tries: 2 }), { type: 'fail', message: 'diverged' });
  assert.equal(next.status, 'failed_permanently');
  assert.equal(next.tries, 3);
  assert.equal(next.error_message, 'diverged');
});

test('success or failure reported after the deadline is rejected as stale', () => {
  const late = at(15 * MINUTE + 1);
  const ok = transition(runningJob(), { type: 'succeed', results: { time: [0] } }, { now: late, config });
  const failed = transition(runningJob(), { type: 'fail', message: 'x' }, { now: late, config });
  assert.equal(ok.ok ? 'accepted' : ok.reason, 'stale');
  assert.equal(failed.ok ? 'accepted' : failed.reason, 'stale');
});

test('timeout is rejected until the deadline has strictly passed', () => {
  const t = transition(runningJob(), { type: 'timeout' }, { now: at(15 * MINUTE), config });
  assert.deepEqual(t, { ok: false, reason: 'illegal_transition', message: 'Experiment is within its timeout' });
});

test('timeout returns the job to pending and counts the attempt', () => {
  const next = accepted(runningJob(), { type: 'timeout' }, at(15 * MINUTE + 1));
  assert.equal(next.status, 'pending');
  assert.equal(next.tries, 1);
  assert.equal(next.started_at, null);
  assert.equal(next.error_message, null);
});

test('timeout on the last try is permanent', () => {
  const next = accepted(runningJob({ tries: 2 }), { type: 'timeout' }, at(16 * MINUTE));
  assert.equal(next.status, 'failed_permanently');
  assert.equal(next.tries, 3);
  assert.equal(next.error_message, 'Experiment timed out after 3 attempts');
  assert.equal(next.started_at, null);
});

test('owner retry of a failed job clears the error but keeps tries', () => {
  const next = accepted(failedJob(), { type: 'retry', requester: 7 });
  assert.equal(next.status, 'pending');
  assert.equal(next.tries, 1);
  assert.equal(next.error_message, null);
  assert.equal(next.retry_at, null);
});

test('retry by someone other than the owner is forbidden', () => {
  const t = transition(failedJob(), { type: 'retry', requester: 8 }, { now: T0, config });
  assert.deepEqual(t, { ok: false, reason: 'forbidden', message: 'Access denied' });
});

test('retry is rejected for every status but failed', () => {
  const cases: Array<[ExperimentJob, string]> = [
    [pendingJob(), 'Experiment is already pending'],
    [runningJob(), 'Experiment is currently running'],
    [
      {
        ...pendingJob(),
        status: 'completed',
        started_at: T0.toISOString(),
        completed_at: T0.toISOString(),
        results: { time: [0] },
      },
      'Experiment is already completed',
    ],
    [
      { ...pendingJob(), status: 'failed_permanently', tries: 3, error_message: 'diverged' },
      'Experiment cannot be retried - permanently failed',
    ],
  ];
  for (const [job, message] of cases) {
    const t = transition(job, { type: 'retry', requester: 7 }, { now: T0, config });
    assert.deepEqual(t, { ok: false, reason: 'not_retryable', message });
  }
});

test('requeue waits for retry_at', () => {
  const early = transition(failedJob(), { type: 'requeue' }, { now: at(1999), config });
  assert.equal(early.ok ? 'accepted' : early.reason, 'not_due');

  const next = accepted(failedJob(), { type: 'requeue' }, at(2000));
  assert.equal(next.status, 'pending');
  assert.equal(next.tries, 1);
  assert.equal(next.error_message, null);
});

test('a permanently failed job accepts no event', () => {
  const job: ExperimentJob = { ...pendingJob(), status: 'failed_permanently', tries: 3, error_message: 'diverged' };
  const events: LifecycleEvent[] = [
    { type: 'claim' },
    { type: 'succeed', results: { time: [0] } },
    { type: 'fail', message: 'x' },
    { type: 'timeout' },
    { type: 'retry', requester: 7 },
    { type: 'requeue' },
  ];
  for (const event of events) {
    assert.equal(transition(job, event, { now: at(60 * MINUTE), config }).ok, false, event.type);
  }
});

function createManager(cfg: LifecycleConfig = config) {
  const dir = mkdtempSync(join(tmpdir(), 'reactor-lifecycle-test-'));
  const path = join(dir, 'lifecycle.db');
  const db = openDatabase(path);
  db.prepare("INSERT INTO users(id, username, password_hash, created_at) VALUES (7, 'alice', 'unused', ?)").run(
    T0.toISOString()
  );
  const clock = { now: T0 };
  const manager = new LifecycleManager(new SqliteJobStore(db), cfg, () => clock.now, silentLogger);
  return { db, manager, clock, path };
}

const newExperiment = {
  owner: 7,
  experiment_name: 'batch-a',
  parameters: { t_add: 7000 },
  input_series: '/uploads/a.tsv',
};

test('create stores a pending job with zero tries', () => {
  const { manager } = createManager();
  const job = manager.create(newExperiment);
  assert.equal(job.status, 'pending');
  assert.equal(job.tries, 0);
  assert.equal(job.version, 0);
  assert.equal(job.created_at, T0.toISOString());
  assert.deepEqual(manager.get(job.id), job);
});

test('two claimants on separate connections: exactly one wins', () => {
  const { manager: a, path } = createManager();
  const b = new LifecycleManager(new SqliteJobStore(openDatabase(path)), config, () => T0, silentLogger);
  const job = a.create(newExperiment);

  const first = a.claim(job.id);
  const second = b.claim(job.id);

  assert.equal(first?.status, 'running');
  assert.equal(second, null);
  assert.equal(b.get(job.id)?.status, 'running');
  assert.equal(b.get(job.id)?.version, 1);
});

test('claimNext skips jobs a concurrent claimant already holds', () => {
  const { manager: a, path } = createManager();
  const b = new LifecycleManager(new SqliteJobStore(openDatabase(path)), config, () => T0, silentLogger);
  const first = a.create(newExperiment);
  const second = a.create(newExperiment);

  assert.equal(b.claimNext()?.id, first.id);
  assert.equal(a.claimNext()?.id, second.id);
  assert.equal(a.claimNext(), null);
});

test('claimNext skips an unreadable pending row and claims the next one', () => {
  const { db, manager } = createManager();
  const broken = manager.create(newExperiment);
  const good = manager.create(newExperiment);
  db.prepare("UPDATE experiments SET parameters_json='{' WHERE id=?").run(broken.id);

  assert.equal(manager.claimNext()?.id, good.id);
  assert.equal(manager.claimNext(), null);
});

test('reclaimStale skips an unreadable running row', () => {
  const { db, manager, clock } = createManager();
  const broken = manager.create(newExperiment);
  const good = manager.create(newExperiment);
  manager.claim(broken.id);
  manager.claim(good.id);
  db.prepare("UPDATE experiments SET parameters_json='[]' WHERE id=?").run(broken.id);

  clock.now = at(15 * MINUTE + 1);
  assert.deepEqual(
    manager.reclaimStale().map((j) => j.id),
    [good.id]
  );
});

test('reclaimStale resets jobs past the deadline and leaves fresh ones alone', () => {
  const { manager, clock } = createManager();
  const old = manager.create(newExperiment);
  manager.claim(old.id);
  clock.now = at(10 * MINUTE);
  const fresh = manager.create(newExperiment);
  manager.claim(fresh.id);

  clock.now = at(15 * MINUTE + 1);
  const reclaimed = manager.reclaimStale();

  assert.deepEqual(
    reclaimed.map((j) => j.id),
    [old.id]
  );
  const stored = manager.get(old.id);
  assert.equal(stored?.status, 'pending');
  assert.equal(stored?.tries, 1);
  assert.equal(stored?.started_at, null);
  assert.equal(manager.get(fresh.id)?.status, 'running');
});

test('a result reported after the deadline reclaims the job instead', () => {
  const { manager, clock } = createManager();
  const job = manager.create(newExperiment);
  const running = manager.claim(job.id);
  assert.ok(running);

  clock.now = at(20 * MINUTE);
  assert.equal(manager.complete(running, { time: [0] }), 'reclaimed');

  const stored = manager.get(job.id);
  assert.equal(stored?.status, 'pending');
  assert.equal(stored?.tries, 1);
  assert.equal(stored?.results, null);
});

test('a result from an attempt the sweep already reclaimed is discarded', () => {
  const { manager, clock } = createManager();
  const job = manager.create(newExperiment);
  const running = manager.claim(job.id);
  assert.ok(running);

  clock.now = at(16 * MINUTE);
  manager.reclaimStale();
  const rerun = manager.claimNext();
  assert.equal(rerun?.id, job.id);

  // the first attempt finally fails; the second attempt still owns the job
  assert.equal(manager.fail(running, 'late failure'), 'lost');
  const stored = manager.get(job.id);
  assert.equal(stored?.status, 'running');
  assert.equal(stored?.tries, 1);
  assert.equal(stored?.started_at, at(16 * MINUTE).toISOString());
});

test('retry of a stale running job reclaims it first', () => {
  const { manager, clock } = createManager();
  const job = manager.create(newExperiment);
  manager.claim(job.id);

  clock.now = at(30 * MINUTE);
  const result = manager.retry(job.id, 7);

  assert.deepEqual(result, { ok: false, reason: 'not_retryable', message: 'Experiment is already pending' });
  assert.equal(manager.get(job.id)?.tries, 1);
});

test('retry of an unknown job or by a stranger is rejected', () => {
  const { manager } = createManager();
  const job = manager.create(newExperiment);
  assert.deepEqual(manager.retry(999, 7), { ok: false, reason: 'not_found', message: 'Experiment not found' });
  assert.deepEqual(manager.retry(job.id, 8), { ok: false, reason: 'forbidden', message: 'Access denied' });
});

test('rejected retries leave completed and permanently failed records unchanged', () => {
  const { manager } = createManager({ ...config, maxTries: 1 });
  const done = manager.create(newExperiment);
  const doomed = manager.create(newExperiment);

  const running = manager.claim(done.id);
  assert.ok(running);
  assert.equal(manager.complete(running, { time: [0, 1] }), 'completed');
  const failing = manager.claim(doomed.id);
  assert.ok(failing);
  assert.equal(manager.fail(failing, 'diverged'), 'failed_permanently');

  for (const id of [done.id, doomed.id]) {
    const before = manager.get(id);
    const result = manager.retry(id, 7);
    assert.equal(result.ok, false);
    assert.deepEqual(manager.get(id), before);
  }
});

test('requeueDue returns failed jobs to pending once their backoff elapses', () => {
  const { manager, clock } = createManager();
  const job = manager.create(newExperiment);
  const running = manager.claim(job.id);
  assert.ok(running);
  assert.equal(manager.fail(running, 'diverged'), 'failed');

  clock.now = at(1999);
  assert.deepEqual(manager.requeueDue(), []);

  clock.now = at(2000);
  assert.deepEqual(
    manager.requeueDue().map((j) => j.id),
    [job.id]
  );
  assert.equal(manager.get(job.id)?.status, 'pending');
});

test('requeueDue does nothing when automatic retry is off', () => {
  const { manager, clock } = createManager({ ...config, autoRetry: false });
  const job = manager.create(newExperiment);
  const running = manager.claim(job.id);
  assert.ok(running);
  manager.fail(running, 'diverged');

  clock.now = at(60 * MINUTE);
  assert.deepEqual(manager.requeueDue(), []);
  assert.equal(manager.get(job.id)?.status, 'failed');
});

test('summary counts every status', () => {
  const { manager } = createManager();
  const a = manager.create(newExperiment);
  manager.create(newExperiment);
  manager.claim(a.id);

  assert.deepEqual(manager.summary(), {
    counts: { pending: 1, running: 1, completed: 0, failed: 0, failed_permanently: 0 },
    oldestPending: T0.toISOString(),
  });
});
