import { errorMessage, truncate } from './errors.js';
import type { LifecycleManager, SettleOutcome } from './lifecycle.js';
import { resolveParameters } from './parameters.js';
import { checkSimulationResults, type Simulator } from './simulator.js';
import type { Logger, SimulationResults } from './types.js';

export interface DispatcherDeps {
  lifecycle: LifecycleManager;
  simulate: Simulator;
  logger?: Logger;
}

export interface DispatchReport {
  processed: 0 | 1;
  job_id?: number;
  outcome?: SettleOutcome;
  reclaimed: number;
  requeued: number;
}

/**
 * One dispatcher invocation: reclaim stale runs, requeue failed jobs whose
 * backoff elapsed, then claim and process at most one pending job.
 *
 * Holds no state between calls, so overlapping invocations are fine; the
 * claim is the only point where they contend. Simulator failures are
 * recorded on the job. Store errors propagate to the caller.
 */
export async function runOnce(deps: DispatcherDeps): Promise<DispatchReport> {
  const { lifecycle, simulate } = deps;
  const logger = deps.logger ?? console;

  const reclaimed = lifecycle.reclaimStale().length;
  const requeued = lifecycle.requeueDue().length;

  const job = lifecycle.claimNext();
  if (!job) return { processed: 0, reclaimed, requeued };

  logger.log(`[dispatcher] processing experiment ${job.id}: ${job.experiment_name} (tries: ${job.tries})`);
  const start = Date.now();

  // only the simulator call is guarded; settle() errors are store errors
  let attempt: { ok: true; results: SimulationResults } | { ok: false; message: string };
  try {
    const raw = await simulate(resolveParameters(job.parameters), job.input_series);
    attempt = { ok: true, results: checkSimulationResults(raw) };
  } catch (err) {
    attempt = { ok: false, message: truncate(errorMessage(err)) };
    logger.error(`[dispatcher] experiment ${job.id} failed: ${attempt.message}`);
  }

  const outcome = attempt.ok ? lifecycle.complete(job, attempt.results) : lifecycle.fail(job, attempt.message);

  switch (outcome) {
    case 'completed':
      logger.log(`[dispatcher] experiment ${job.id} completed in ${Date.now() - start}ms`);
      break;
    case 'failed':
      logger.warn(`[dispatcher] experiment ${job.id} failed (try ${job.tries + 1}/${lifecycle.config.maxTries})`);
      break;
    case 'failed_permanently':
      logger.error(
        `[dispatcher] experiment ${job.id} marked as permanently failed (exceeded ${lifecycle.config.maxTries} tries)`
      );
      break;
    case 'reclaimed':
      logger.warn(`[dispatcher] experiment ${job.id} exceeded its timeout before finishing; reclaimed`);
      break;
    case 'lost':
      logger.warn(`[dispatcher] experiment ${job.id} changed while running; outcome discarded`);
      break;
  }

  return { processed: 1, job_id: job.id, outcome, reclaimed, requeued };
}

/** Repeat `runOnce` until the queue is empty or `limit` jobs were processed. */
export async function drain(deps: DispatcherDeps, limit: number): Promise<DispatchReport[]> {
  const reports: DispatchReport[] = [];
  while (reports.length < limit) {
    const report = await runOnce(deps);
    if (report.processed === 0) break;
    reports.push(report);
  }
  return reports;
}
