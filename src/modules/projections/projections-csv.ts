import Papa from 'papaparse';
import { PROJECTION_COLUMNS, ProjectionRow } from './projections.model';

/**
 * Render rows as CSV: a header line, one line per row, `\n` endings and a
 * trailing newline. Null values become empty fields.
 */
export function formatProjectionCsv(rows: ReadonlyArray<ProjectionRow>): string {
  const csv = Papa.unparse(
    {
      fields: [...PROJECTION_COLUMNS],
      data: rows.map((row) => PROJECTION_COLUMNS.map((column) => row[column])),
    },
    { newline: '\n' }
  );
  // unparse ends a header-only document with a newline already
  return csv.endsWith('\n') ? csv : `${csv}\n`;
}
