import { describe, it, expect } from 'vitest';
import { assemble } from '../src/extraction/RecordAggregator.js';
import { simulateResultSet } from '../src/simulate.js';
import { WARN, captureLogger } from './helpers/fake-portal.js';

const sub = (id: string, ratings: Array<number | null> = []) => ({
  id,
  title: `Paper ${id}`,
  ratings,
  confidences: [],
  finalRatings: [],
});

describe('assemble', () => {
  it('numbers records from 1 in the order received', () => {
    const result = assemble('conf_2025', [sub('b'), sub('a'), sub('c')], 0);
    expect(result.records.map((r) => [r.index, r.id])).toEqual([[1, 'b'], [2, 'a'], [3, 'c']]);
  });

  it('freezes the result and copies the score lists', () => {
    const ratings = [8, 9];
    const result = assemble('conf_2025', [sub('a', ratings)], 1);
    ratings.push(10);

    expect(result.records[0]?.ratings).toEqual([8, 9]);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.records)).toBe(true);
    expect(Object.isFrozen(result.records[0]?.ratings)).toBe(true);
    expect(result.skippedRows).toBe(1);
  });

  it('keeps duplicates and warns about each repeat', () => {
    const { logger, lines } = captureLogger();
    const result = assemble('conf_2025', [sub('a'), sub('b'), sub('a'), sub('a')], 0, logger);

    expect(result.records).toHaveLength(4);
    expect(result.duplicateIds).toEqual(['a']);
    expect(lines.filter((l) => l.level === WARN).map((l) => [l.msg, l.index])).toEqual([
      ['Duplicate submission identifier', 3],
      ['Duplicate submission identifier', 4],
    ]);
  });

  it('handles an empty list', () => {
    expect(assemble('conf_2025', [], 0).records).toEqual([]);
  });
});

describe('simulateResultSet', () => {
  it('produces numbered records with scores in range', () => {
    const result = simulateResultSet('demo', 7);

    expect(result.conference).toBe('demo');
    expect(result.records.map((r) => r.index)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    for (const r of result.records) {
      expect(r.title).toMatch(/^Title [A-Z]$/);
      expect(r.confidences).toHaveLength(r.ratings.length);
      for (const score of [...r.ratings, ...r.finalRatings]) {
        expect(score).toBeGreaterThanOrEqual(1);
        expect(score).toBeLessThanOrEqual(5);
      }
    }
  });
});
