import type { Runtime } from '../runtime.js';
import { requireUserId } from './context.js';

export function retryExperiment(rt: Runtime, id: number, username: string) {
  const result = rt.lifecycle.retry(id, requireUserId(rt, username));
  if (!result.ok) {
    throw new Error(`Cannot retry experiment ${id}: ${result.message}`);
  }
  console.log(`Re-queued experiment ${id} (tries so far: ${result.job.tries})`);
}
