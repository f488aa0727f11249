import { drain } from '../core/dispatcher.js';
import { errorMessage } from '../core/errors.js';
import type { Runtime } from '../runtime.js';

function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export interface DispatchOptions {
  limit: number;
  /** Seconds between invocations; without it, run once and return. */
  interval?: number;
}

async function tick(rt: Runtime, limit: number) {
  const reports = await drain({ lifecycle: rt.lifecycle, simulate: rt.simulate }, limit);
  if (reports.length === 0) console.log('[dispatcher] no pending experiments');
}

/**
 * Entry point for the external scheduler (cron runs `reactorctl dispatch`).
 * `--interval` makes this process act as the scheduler instead.
 */
export async function dispatchCommand(rt: Runtime, opts: DispatchOptions) {
  if (opts.interval === undefined) {
    await tick(rt, opts.limit);
    return;
  }

  const stopSignal = { stop: false };
  const stop = () => {
    stopSignal.stop = true;
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  console.log(`[dispatcher] running every ${opts.interval}s; Ctrl+C to stop`);
  while (!stopSignal.stop) {
    try {
      await tick(rt, opts.limit);
    } catch (err) {
      console.error(`[dispatcher] invocation failed: ${errorMessage(err)}`);
    }
    await sleep(opts.interval * 1000);
  }
}
