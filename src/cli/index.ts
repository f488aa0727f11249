#!/usr/bin/env node
import { Command } from 'commander';
import { errorMessage } from '../core/errors.js';
import { closeDB } from '../db/db.js';
import type { Runtime } from '../runtime.js';
import { createApp, startServer } from '../web/server.js';
import { getConfigAll, setConfigKV } from './config_cmd.js';
import { openRuntime } from './context.js';
import { dispatchCommand } from './dispatch.js';
import { retryExperiment } from './retry.js';
import { printList, printStatus } from './status.js';
import { submitExperiment } from './submit.js';

function positiveInt(raw: string, name: string) {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new Error(`${name} must be a positive integer`);
  return n;
}

function collect(value: string, previous: string[]) {
  return [...previous, value];
}

/** Open the runtime, run the action, and turn failures into exit code 1. */
function withRuntime<A extends unknown[]>(fn: (rt: Runtime, ...args: A) => void | Promise<void>) {
  return async (...args: A) => {
    try {
      await fn(openRuntime(), ...args);
    } catch (err) {
      console.error(`❌ ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program
  .name('reactorctl')
  .description('Queue, process and inspect reactor simulation experiments')
  .version('0.1.0');

program
  .command('serve')
  .description('start the HTTP API')
  .action(
    withRuntime(async (rt) => {
      const app = createApp({
        lifecycle: rt.lifecycle,
        users: rt.users,
        uploadsDir: rt.settings.uploadsDir,
        maxUploadBytes: rt.settings.maxUploadBytes,
      });
      const server = await startServer(app, rt.settings.host, rt.settings.port);
      const shutdown = () => {
        server.close(() => closeDB());
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    })
  );

program
  .command('dispatch')
  .description('reclaim stale runs, then process the next pending experiment')
  .option('--limit <n>', 'process up to n experiments in this invocation', '1')
  .option('--interval <sec>', 'repeat every sec seconds until interrupted')
  .action(
    withRuntime(async (rt, opts: { limit: string; interval?: string }) => {
      await dispatchCommand(rt, {
        limit: positiveInt(opts.limit, '--limit'),
        interval: opts.interval === undefined ? undefined : positiveInt(opts.interval, '--interval'),
      });
      closeDB();
    })
  );

program
  .command('submit')
  .description('queue an experiment from a TSV file')
  .argument('<tsv>', 'path to the time-series file')
  .requiredOption('--user <username>', 'owner of the experiment')
  .requiredOption('--name <name>', 'experiment name')
  .option('--param <key=value>', 'simulation parameter (repeatable)', collect, [])
  .action(
    withRuntime((rt, tsvPath: string, opts: { user: string; name: string; param: string[] }) => {
      const job = submitExperiment(rt, { tsvPath, username: opts.user, name: opts.name, params: opts.param });
      console.log(`✅ Queued experiment ${job.id} (${job.experiment_name})`);
    })
  );

program
  .command('status')
  .description('experiment counts per status')
  .action(withRuntime((rt) => printStatus(rt)));

program
  .command('list')
  .option('--user <username>', 'only this user’s experiments, in creation order')
  .option('--status <status>', 'pending|running|completed|failed|failed_permanently')
  .action(withRuntime((rt, opts: { user?: string; status?: string }) => printList(rt, opts)));

program
  .command('retry')
  .argument('<id>', 'experiment id')
  .requiredOption('--user <username>', 'must be the experiment owner')
  .action(
    withRuntime((rt, id: string, opts: { user: string }) => retryExperiment(rt, positiveInt(id, 'id'), opts.user))
  );

const user = program.command('user');
user
  .command('add')
  .argument('<username>')
  .argument('<password>')
  .action(
    withRuntime((rt, username: string, password: string) => {
      const id = rt.users.createUser(username, password);
      console.log(`✅ Created user ${username} (id ${id})`);
    })
  );
user
  .command('prune-sessions')
  .description('delete expired session tokens')
  .action(
    withRuntime((rt) => {
      console.log(`Deleted ${rt.users.cleanupExpiredSessions()} expired session(s)`);
    })
  );

const config = program.command('config');
config.command('get').action(
  withRuntime((rt) => {
    console.log(getConfigAll(rt.db));
  })
);
config
  .command('set')
  .argument('<key>')
  .argument('<value>')
  .action(
    withRuntime((rt, key: string, value: string) => {
      setConfigKV(rt.db, key, value);
      console.log('OK');
    })
  );

await program.parseAsync(process.argv);
