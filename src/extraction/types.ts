/** A score list; null marks a slot whose value never populated or was not a number. */
export type Scores = readonly (number | null)[];

export interface RawSubmission {
  id: string;
  title: string;
  ratings: Scores;
  confidences: Scores;
  finalRatings: Scores;
}

export interface SubmissionRecord extends Readonly<RawSubmission> {
  /** 1-based position in portal order. */
  readonly index: number;
}

export interface ResultSet {
  readonly conference: string;
  readonly records: readonly SubmissionRecord[];
  /** Rows dropped because their identifier or title could not be read. */
  readonly skippedRows: number;
  readonly duplicateIds: readonly string[];
}
