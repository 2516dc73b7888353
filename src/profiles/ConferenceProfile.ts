/** Reads one value from a scope: the element matched by `selector`, or the scope itself. */
export interface FieldRule {
  selector?: string;
  /** Read this attribute instead of the element's text. */
  attribute?: string;
  /** Keep only the text after the first occurrence of this marker. */
  startText?: string;
  /** ...and before the next occurrence of this one. */
  endText?: string;
}

export type ExtractMethod = 'decimal' | 'firstNumber';

export interface RatingRule {
  /** Marker that identifies the field inside a slot; without it every slot counts. */
  startText?: string;
  endText?: string;
  extractMethod: ExtractMethod;
}

export type RatingField = 'rating' | 'confidence' | 'finalRating';

export interface RatingRules {
  /** Elements, one per reviewer reply, that may carry a score. */
  slots: string;
  rating?: RatingRule;
  confidence?: RatingRule;
  finalRating?: RatingRule;
}

export interface LoginRules {
  usernameSelector: string;
  passwordSelector: string;
  submitSelector: string;
  /** Present once the reviewer landing page has rendered. */
  successSelector: string;
  /** Present when the portal rejected the credentials. */
  failureSelector?: string;
}

export interface RowRules {
  selector: string;
  /** When set, each row links to a detail page that holds the fields. */
  detailLink?: { attribute: string };
}

export interface ConferenceProfile {
  readonly key: string;
  readonly name: string;
  readonly url: string;
  readonly reviewsExpected: boolean;
  readonly login: Readonly<LoginRules>;
  readonly rows: Readonly<RowRules>;
  readonly identifier: Readonly<FieldRule>;
  readonly title: Readonly<FieldRule>;
  readonly ratings?: Readonly<RatingRules>;
}
