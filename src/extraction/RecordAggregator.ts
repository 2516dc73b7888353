import type { Logger } from 'pino';
import type { RawSubmission, ResultSet, SubmissionRecord } from './types.js';

/**
 * Numbers raw submissions in the order received and freezes the result.
 * Duplicate identifiers are reported but kept: portals show reposted entries.
 */
export function assemble(
  conference: string,
  raw: readonly RawSubmission[],
  skippedRows: number,
  logger?: Logger,
): ResultSet {
  const seen = new Set<string>();
  const duplicates = new Set<string>();

  const records: SubmissionRecord[] = raw.map((sub, i) => {
    if (seen.has(sub.id)) {
      duplicates.add(sub.id);
      logger?.warn({ id: sub.id, index: i + 1 }, 'Duplicate submission identifier');
    }
    seen.add(sub.id);
    return Object.freeze({
      index: i + 1,
      id: sub.id,
      title: sub.title,
      ratings: Object.freeze([...sub.ratings]),
      confidences: Object.freeze([...sub.confidences]),
      finalRatings: Object.freeze([...sub.finalRatings]),
    });
  });

  return Object.freeze({
    conference,
    records: Object.freeze(records),
    skippedRows,
    duplicateIds: Object.freeze([...duplicates]),
  });
}
