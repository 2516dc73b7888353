import type { Scores } from '../extraction/types.js';

const NONE = '-';

function present(values: Scores): number[] {
  return values.filter((v): v is number => v !== null);
}

/** "8, 9" for a score list; absent entries show as "-", an empty list as "-". */
export function formatScores(values: Scores): string {
  if (values.length === 0) return NONE;
  return values.map((v) => (v === null ? NONE : String(v))).join(', ');
}

export function mean(values: Scores, precision = 2): string {
  const nums = present(values);
  if (nums.length === 0) return NONE;
  return (nums.reduce((a, b) => a + b, 0) / nums.length).toFixed(precision);
}

/** Population standard deviation over the present values. */
export function std(values: Scores, precision = 2): string {
  const nums = present(values);
  if (nums.length === 0) return NONE;
  const avg = nums.reduce((a, b) => a + b, 0) / nums.length;
  const variance = nums.reduce((acc, v) => acc + (v - avg) ** 2, 0) / nums.length;
  return Math.sqrt(variance).toFixed(precision);
}
