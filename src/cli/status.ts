import { EXPERIMENT_STATUSES, type ExperimentStatus } from '../core/types.js';
import type { Runtime } from '../runtime.js';
import { requireUserId } from './context.js';

export function printStatus(rt: Runtime) {
  const { counts, oldestPending } = rt.lifecycle.summary();
  for (const s of EXPERIMENT_STATUSES) {
    console.log(`${s.padEnd(20)} ${counts[s]}`);
  }
  console.log(`oldest pending       ${oldestPending ?? '-'}`);
  const c = rt.lifecycle.config;
  console.log(`max tries ${c.maxTries}, timeout ${c.timeoutMs / 60_000}min, auto retry ${c.autoRetry ? 'on' : 'off'}`);
}

export function parseStatus(raw: string): ExperimentStatus {
  const status = EXPERIMENT_STATUSES.find((s) => s === raw);
  if (!status) throw new Error(`Unknown status "${raw}" (expected ${EXPERIMENT_STATUSES.join('|')})`);
  return status;
}

export function printList(rt: Runtime, opts: { user?: string; status?: string }) {
  const status = opts.status ? parseStatus(opts.status) : undefined;
  const jobs = opts.user
    ? rt.lifecycle.list(requireUserId(rt, opts.user)).filter((j) => !status || j.status === status)
    : rt.lifecycle.listByStatus(status ?? 'pending');

  if (jobs.length === 0) {
    console.log('No experiments');
    return;
  }
  for (const j of jobs) {
    const err = j.error_message ? `  ${j.error_message.slice(0, 60)}` : '';
    console.log(`${String(j.id).padStart(5)}  ${j.status.padEnd(18)} ${j.tries}/${rt.lifecycle.config.maxTries}  ${j.created_at}  ${j.experiment_name}${err}`);
  }
}
