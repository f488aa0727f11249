import { z } from 'zod';
import type { ReactorParameters, ResolvedParameters } from './types.js';

export const PARAMETER_DEFAULTS = {
  t_add: 7380,
  t_span_start: 0,
  t_span_end: 13100,
  dt: 1,
  f_j1: 0.05,
  f_j2: 10,
} as const;

const num = z.number().finite();

export const reactorParametersSchema = z
  .object({
    t_add: num.optional(),
    t_span_start: num.optional(),
    t_span_end: num.optional(),
    dt: num.positive().optional(),
    f_j1: num.optional(),
    f_j2: num.optional(),
    // initial conditions; the simulator derives them when absent
    L_0i: num.optional(),
    CVAM_r0i: num.optional(),
    CBA_r0i: num.optional(),
    CNaPS_r0i: num.optional(),
    CTBHP_r0i: num.optional(),
    CCRD_r0i: num.optional(),
    CMPOL_r0i: num.optional(),
    Np_r0i: num.optional(),
    T1_0i: num.optional(),
    T3_0i: num.optional(),
  })
  .strict()
  .refine(
    (p) =>
      (p.t_span_end ?? PARAMETER_DEFAULTS.t_span_end) > (p.t_span_start ?? PARAMETER_DEFAULTS.t_span_start),
    { message: 't_span_end must be greater than t_span_start', path: ['t_span_end'] }
  );

export function resolveParameters(p: ReactorParameters): ResolvedParameters {
  return {
    ...p,
    t_add: p.t_add ?? PARAMETER_DEFAULTS.t_add,
    t_span_start: p.t_span_start ?? PARAMETER_DEFAULTS.t_span_start,
    t_span_end: p.t_span_end ?? PARAMETER_DEFAULTS.t_span_end,
    dt: p.dt ?? PARAMETER_DEFAULTS.dt,
    f_j1: p.f_j1 ?? PARAMETER_DEFAULTS.f_j1,
    f_j2: p.f_j2 ?? PARAMETER_DEFAULTS.f_j2,
  };
}

/**
 * Parse `key=value` pairs (CLI `--param`) into parameters.
 * Throws with the zod issue list when a key or value is rejected.
 */
export function parseParameterPairs(pairs: string[]): ReactorParameters {
  const raw: Record<string, number> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) throw new Error(`Expected key=value, got "${pair}"`);
    const key = pair.slice(0, eq).trim();
    const value = Number(pair.slice(eq + 1).trim());
    if (!Number.isFinite(value)) throw new Error(`Parameter ${key} must be a number`);
    raw[key] = value;
  }
  const parsed = reactorParametersSchema.safeParse(raw);
  if (!parsed.success) throw new Error(formatIssues(parsed.error));
  return parsed.data;
}

export function formatIssues(err: z.ZodError): string {
  return err.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}
