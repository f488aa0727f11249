export type ExperimentStatus = 'pending' | 'running' | 'completed' | 'failed' | 'failed_permanently';

export const EXPERIMENT_STATUSES: readonly ExperimentStatus[] = [
  'pending',
  'running',
  'completed',
  'failed',
  'failed_permanently',
];

/**
 * Simulation inputs as submitted. Every field is optional; see
 * `resolveParameters` for the defaults the simulator receives.
 */
export interface ReactorParameters {
  t_add?: number;
  t_span_start?: number;
  t_span_end?: number;
  dt?: number;
  f_j1?: number;
  f_j2?: number;
  L_0i?: number;
  CVAM_r0i?: number;
  CBA_r0i?: number;
  CNaPS_r0i?: number;
  CTBHP_r0i?: number;
  CCRD_r0i?: number;
  CMPOL_r0i?: number;
  Np_r0i?: number;
  T1_0i?: number;
  T3_0i?: number;
}

export type ResolvedParameters = ReactorParameters &
  Required<Pick<ReactorParameters, 't_add' | 't_span_start' | 't_span_end' | 'dt' | 'f_j1' | 'f_j2'>>;

/** Named result columns, e.g. `time`, `reactor_temperature`. */
export type SimulationResults = Record<string, number[]>;

export interface ExperimentBase {
  id: number;
  /** Bumped by every committed transition; the store's compare-and-swap token. */
  version: number;
  owner: number;
  experiment_name: string;
  tries: number;
  created_at: string;
  updated_at: string;
  parameters: ReactorParameters;
  input_series: string;
}

export interface PendingExperiment extends ExperimentBase {
  status: 'pending';
  started_at: null;
  completed_at: null;
  retry_at: null;
  results: null;
  error_message: null;
}

export interface RunningExperiment extends ExperimentBase {
  status: 'running';
  started_at: string;
  completed_at: null;
  retry_at: null;
  results: null;
  error_message: null;
}

export interface CompletedExperiment extends ExperimentBase {
  status: 'completed';
  started_at: string | null;
  completed_at: string;
  retry_at: null;
  results: SimulationResults;
  error_message: null;
}

export interface FailedExperiment extends ExperimentBase {
  status: 'failed';
  started_at: null;
  completed_at: null;
  retry_at: string | null;
  results: null;
  error_message: string;
}

export interface PermanentlyFailedExperiment extends ExperimentBase {
  status: 'failed_permanently';
  started_at: null;
  completed_at: null;
  retry_at: null;
  results: null;
  error_message: string;
}

export type ExperimentJob =
  | PendingExperiment
  | RunningExperiment
  | CompletedExperiment
  | FailedExperiment
  | PermanentlyFailedExperiment;

export interface NewExperiment {
  owner: number;
  experiment_name: string;
  parameters: ReactorParameters;
  input_series: string;
}

export interface LifecycleConfig {
  maxTries: number;
  timeoutMs: number;
  backoffBaseSec: number;
  autoRetry: boolean;
}

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  error: () => {},
};
