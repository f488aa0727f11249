import type Database from 'better-sqlite3';
import { parseCommandString } from 'execa';
import { resolveLifecycleConfig, type Settings } from './config.js';
import { LifecycleManager } from './core/lifecycle.js';
import { createCommandSimulator, unconfiguredSimulator, type Simulator } from './core/simulator.js';
import type { Logger } from './core/types.js';
import { SqliteJobStore } from './db/repo.js';
import { UserRepository } from './db/users.js';

export interface Runtime {
  settings: Settings;
  db: Database.Database;
  lifecycle: LifecycleManager;
  users: UserRepository;
  simulate: Simulator;
}

export interface RuntimeOptions {
  clock?: () => Date;
  simulate?: Simulator;
  logger?: Logger;
}

function commandSimulator(commandLine: string | undefined): Simulator {
  if (commandLine === undefined) return unconfiguredSimulator;
  const [command, ...args] = parseCommandString(commandLine);
  return command === undefined ? unconfiguredSimulator : createCommandSimulator({ command, args });
}

/** Wire stores, lifecycle and simulator over an open database. */
export function createRuntime(db: Database.Database, settings: Settings, opts: RuntimeOptions = {}): Runtime {
  const clock = opts.clock ?? (() => new Date());
  const logger = opts.logger ?? console;
  const config = resolveLifecycleConfig(db, settings);
  const users = new UserRepository(db, settings.sessionHours, clock);

  if (settings.admin) {
    users.ensureUser(settings.admin.username, settings.admin.password);
  }

  const simulate = opts.simulate ?? commandSimulator(settings.simulatorCommand);

  return {
    settings,
    db,
    lifecycle: new LifecycleManager(new SqliteJobStore(db), config, clock, logger),
    users,
    simulate,
  };
}
