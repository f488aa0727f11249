import { execa, ExecaError } from 'execa';
import { existsSync } from 'node:fs';
import { z } from 'zod';
import { SimulationError, truncate } from './errors.js';
import type { ResolvedParameters, SimulationResults } from './types.js';

/**
 * The processing function. Resolves with the result table or rejects;
 * a rejection fails only the attempt that made the call.
 */
export type Simulator = (parameters: ResolvedParameters, inputSeries: string) => Promise<SimulationResults>;

// NaN and Infinity have no JSON form; they would be stored as null
export const simulationResultsSchema = z.record(z.array(z.number().finite()));

/** Check a result table before it is stored. */
export function checkSimulationResults(raw: unknown): SimulationResults {
  const parsed = simulationResultsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SimulationError('Simulator output must map column names to arrays of finite numbers');
  }
  if (Object.keys(parsed.data).length === 0) {
    throw new SimulationError('Simulation failed - no solution returned');
  }
  return parsed.data;
}

export function parseSimulationOutput(stdout: string): SimulationResults {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    throw new SimulationError(`Simulator output is not valid JSON: ${truncate(stdout.trim(), 200)}`);
  }
  return checkSimulationResults(raw);
}

export interface CommandSimulatorOptions {
  /** Executable to run, e.g. `./bin/simulate`. */
  command: string;
  /** Leading arguments; the input series path is appended after them. */
  args?: string[];
  cwd?: string;
}

/**
 * Runs an external simulator as `command ...args <input series path>`.
 * It receives `{ parameters, input_series }` as JSON on stdin and must print
 * the result table as JSON on stdout.
 * No timeout is applied here; stuck runs are reclaimed by the lifecycle sweep.
 */
export function createCommandSimulator(opts: CommandSimulatorOptions): Simulator {
  const args = opts.args ?? [];
  return async (parameters, inputSeries) => {
    if (!existsSync(inputSeries)) {
      throw new SimulationError(`Input series not found: ${inputSeries}`);
    }

    try {
      const proc = await execa(opts.command, [...args, inputSeries], {
        cwd: opts.cwd,
        input: JSON.stringify({ parameters, input_series: inputSeries }),
        windowsHide: true,
      });
      return parseSimulationOutput(proc.stdout);
    } catch (err) {
      if (err instanceof SimulationError) throw err;
      if (err instanceof ExecaError) {
        const execaError: ExecaError = err;
        const stderr = typeof execaError.stderr === 'string' ? execaError.stderr.trim() : '';
        throw new SimulationError(stderr || execaError.shortMessage, { cause: execaError });
      }
      throw err;
    }
  };
}

/** Stand-in used when no simulator command is configured. */
export const unconfiguredSimulator: Simulator = async () => {
  throw new SimulationError('No simulator configured (set SIMULATOR_COMMAND)');
};
