import type { RatingRule } from './ConferenceProfile.js';

const DECIMAL = /^[-+]?(?:\d+\.?\d*|\.\d+)$/;
const FIRST_NUMBER = /[-+]?\d+(?:\.\d+)?/;

/**
 * Cuts `text` down to the part after `startText` and before the following `endText`.
 * Returns null when `startText` is given but absent. A missing `endText` keeps the rest.
 */
export function applyWindow(text: string, startText?: string, endText?: string): string | null {
  let from = 0;
  if (startText) {
    const idx = text.indexOf(startText);
    if (idx === -1) return null;
    from = idx + startText.length;
  }
  let to = text.length;
  if (endText) {
    const idx = text.indexOf(endText, from);
    if (idx !== -1) to = idx;
  }
  return text.slice(from, to);
}

export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function extractFirstNumber(text: string): number | null {
  const match = FIRST_NUMBER.exec(text);
  return match ? Number(match[0]) : null;
}

/**
 * Value of one rating slot.
 * undefined: the slot does not carry this field at all (marker absent).
 * null: the marker is there but no number follows it.
 */
export function extractRating(text: string, rule: RatingRule): number | null | undefined {
  const window = applyWindow(text, rule.startText, rule.endText);
  if (window === null) return undefined;
  return rule.extractMethod === 'firstNumber' ? extractFirstNumber(window) : parseDecimal(window);
}
