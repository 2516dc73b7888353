import { writeFile } from 'node:fs/promises';
import type { ResultSet } from '../extraction/types.js';
import { formatScores, mean, std } from './stats.js';

export const CSV_HEADER = '#,ID,Title,Ratings,Avg,Std,Confidences,Final Ratings,Final Avg,Final Std';

function quote(text: string): string {
  return `"${text.replace(/"/g, '""')}"`;
}

export function toCsv(result: ResultSet): string {
  const lines = [CSV_HEADER];
  for (const r of result.records) {
    lines.push([
      String(r.index),
      quote(r.id),
      quote(r.title),
      quote(formatScores(r.ratings)),
      mean(r.ratings),
      std(r.ratings),
      quote(formatScores(r.confidences)),
      quote(formatScores(r.finalRatings)),
      mean(r.finalRatings),
      std(r.finalRatings),
    ].join(','));
  }
  return lines.join('\n') + '\n';
}

export async function saveCsv(result: ResultSet, filename: string): Promise<void> {
  await writeFile(filename, toCsv(result), 'utf-8');
}
