/** Raised by a simulator when an attempt cannot produce results. */
export class SimulationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SimulationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A stored experiment row that does not satisfy the lifecycle invariants. */
export class CorruptRecordError extends Error {
  constructor(id: number, detail: string) {
    super(`Experiment ${id} is corrupt: ${detail}`);
    this.name = 'CorruptRecordError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function truncate(s: string, max = 4000) {
  if (s.length <= max) return s;
  return s.slice(0, max) + `\n...[truncated ${s.length - max} chars]`;
}
