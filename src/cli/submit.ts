import { randomUUID } from 'node:crypto';
import { copyFileSync, mkdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { parseParameterPairs } from '../core/parameters.js';
import { parseTimeSeries } from '../core/series.js';
import type { ExperimentJob } from '../core/types.js';
import type { Runtime } from '../runtime.js';
import { requireUserId } from './context.js';

export interface SubmitInput {
  tsvPath: string;
  username: string;
  name: string;
  params: string[];
}

/**
 * Queue an experiment from a TSV file on disk. The file is validated, then
 * copied into the uploads directory so the job's input never changes.
 */
export function submitExperiment(rt: Runtime, input: SubmitInput): ExperimentJob {
  const owner = requireUserId(rt, input.username);
  const parameters = parseParameterPairs(input.params);
  parseTimeSeries(readFileSync(input.tsvPath, 'utf8'));

  mkdirSync(rt.settings.uploadsDir, { recursive: true });
  const stored = path.join(rt.settings.uploadsDir, `${randomUUID()}${path.extname(input.tsvPath) || '.tsv'}`);
  copyFileSync(input.tsvPath, stored);

  return rt.lifecycle.create({
    owner,
    experiment_name: input.name,
    parameters,
    input_series: stored,
  });
}
