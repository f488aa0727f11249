export const REQUIRED_COLUMNS = [
  't[s]',
  'F2[m^3/s]',
  'F7[m^3/s]',
  'F8[m^3/s]',
  'F9[m^3/s]',
  'RPS[RPS]',
  'T1[K]',
  'T2[K]',
  'T3[K]',
] as const;

export interface TimeSeries {
  columns: string[];
  rows: number[][];
}

export class SeriesFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SeriesFormatError';
  }
}

/**
 * Parse tab-separated experiment data: one header row, then numeric rows.
 * Blank lines are skipped and CRLF endings accepted.
 */
export function parseTimeSeries(text: string): TimeSeries {
  const lines = text.split(/\r?\n/).filter((l) => l.trim() !== '');
  const header = lines[0];
  if (header === undefined) throw new SeriesFormatError('Time series is empty');

  const columns = header.split('\t').map((c) => c.trim());
  const missing = REQUIRED_COLUMNS.filter((c) => !columns.includes(c));
  if (missing.length > 0) {
    throw new SeriesFormatError(`Missing required columns: ${missing.join(', ')}`);
  }

  const rows: number[][] = [];
  for (let i = 1; i < lines.length; i++) {
    const cells = (lines[i] ?? '').split('\t');
    if (cells.length !== columns.length) {
      throw new SeriesFormatError(`Row ${i} has ${cells.length} cells, expected ${columns.length}`);
    }
    rows.push(
      cells.map((cell, j) => {
        const value = Number(cell.trim());
        if (cell.trim() === '' || !Number.isFinite(value)) {
          throw new SeriesFormatError(`Row ${i}, column ${columns[j]}: "${cell}" is not a number`);
        }
        return value;
      })
    );
  }

  if (rows.length === 0) throw new SeriesFormatError('Time series has no data rows');
  return { columns, rows };
}
