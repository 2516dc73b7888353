import { randomInt } from 'node:crypto';
import { assemble } from './extraction/RecordAggregator.js';
import type { RawSubmission, ResultSet } from './extraction/types.js';

const LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

function scores(count: number): number[] {
  return Array.from({ length: count }, () => randomInt(1, 6));
}

/** Random submissions for trying the output path without a browser. */
export function simulateResultSet(conference: string, count = 5): ResultSet {
  const raw: RawSubmission[] = [];
  for (let i = 0; i < count; i++) {
    const ratings = scores(randomInt(0, 4));
    raw.push({
      id: String(randomInt(1000, 20000)),
      title: `Title ${LETTERS[randomInt(0, LETTERS.length)]}`,
      ratings,
      confidences: scores(ratings.length),
      finalRatings: scores(randomInt(0, 4)),
    });
  }
  return assemble(conference, raw, 0);
}
