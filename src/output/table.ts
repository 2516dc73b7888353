import type { ResultSet, SubmissionRecord } from '../extraction/types.js';
import { formatScores, mean, std } from './stats.js';

type Align = 'left' | 'right';

interface Column {
  header: string;
  align: Align;
  cell(record: SubmissionRecord): string;
}

export const COLUMNS: readonly Column[] = [
  { header: '#', align: 'right', cell: (r) => String(r.index) },
  { header: 'ID', align: 'right', cell: (r) => r.id },
  { header: 'Title', align: 'left', cell: (r) => r.title },
  { header: 'Ratings', align: 'right', cell: (r) => formatScores(r.ratings) },
  { header: 'Avg', align: 'right', cell: (r) => mean(r.ratings) },
  { header: 'Std', align: 'right', cell: (r) => std(r.ratings) },
  { header: 'Confidences', align: 'right', cell: (r) => formatScores(r.confidences) },
  { header: 'Final Ratings', align: 'right', cell: (r) => formatScores(r.finalRatings) },
  { header: 'Final Avg', align: 'right', cell: (r) => mean(r.finalRatings) },
  { header: 'Final Std', align: 'right', cell: (r) => std(r.finalRatings) },
];

function pad(text: string, width: number, align: Align): string {
  return align === 'left' ? text.padEnd(width) : text.padStart(width);
}

/** Plain-text table, one line per record, columns separated by " | ". */
export function renderTable(result: ResultSet): string {
  const rows = result.records.map((r) => COLUMNS.map((c) => c.cell(r)));
  const widths = COLUMNS.map((c, i) => Math.max(c.header.length, ...rows.map((row) => row[i].length)));

  const line = (cells: string[]) =>
    cells.map((cell, i) => pad(cell, widths[i], COLUMNS[i].align)).join(' | ').trimEnd();

  const out = [
    line(COLUMNS.map((c) => c.header)),
    widths.map((w) => '-'.repeat(w)).join('-+-'),
    ...rows.map(line),
  ];
  if (result.skippedRows > 0) {
    out.push('', `${result.skippedRows} row(s) skipped`);
  }
  return out.join('\n');
}
