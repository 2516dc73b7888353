/**
 * Applies a profile's declarative rules to a live page.
 * Nothing here knows about a particular conference.
 */

import type { PortalElement, Scope } from '../browser/PortalPage.js';
import { resolvePortalUrl } from '../utils/url-validator.js';
import type { ConferenceProfile, FieldRule, RatingField, RatingRules } from './ConferenceProfile.js';
import { applyWindow, extractRating } from './text-rules.js';

export type RatingValues = Record<RatingField, Array<number | null>>;

const RATING_FIELDS: readonly RatingField[] = ['rating', 'confidence', 'finalRating'];

function isElement(scope: Scope): scope is PortalElement {
  return 'attribute' in scope;
}

function normalizeSpace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function locateRows(page: Scope, profile: ConferenceProfile): Promise<PortalElement[]> {
  return page.queryAll(profile.rows.selector);
}

/** Raw value of a field, or null when its element, attribute or marker is missing or the value is blank. */
export async function readField(scope: Scope, rule: FieldRule): Promise<string | null> {
  let target: Scope = scope;
  if (rule.selector) {
    const [first] = await scope.queryAll(rule.selector);
    if (!first) return null;
    target = first;
  }

  let raw: string | null;
  if (rule.attribute) {
    raw = isElement(target) ? await target.attribute(rule.attribute) : null;
  } else {
    raw = await target.text();
  }
  if (raw === null) return null;

  const windowed = applyWindow(raw, rule.startText, rule.endText);
  if (windowed === null) return null;
  const value = normalizeSpace(windowed);
  return value || null;
}

/** Texts of the rating slots currently rendered inside `scope`, in document order. */
export async function readRatingSlots(scope: Scope, rules: RatingRules): Promise<string[]> {
  const slots = await scope.queryAll(rules.slots);
  const texts: string[] = [];
  for (const slot of slots) {
    texts.push(await slot.text());
  }
  return texts;
}

/**
 * Turns slot texts into per-field value lists. A slot counts for a field only
 * when its text carries that field's marker; a marker without a number is null.
 */
export function extractRatingValues(slotTexts: readonly string[], rules: RatingRules): RatingValues {
  const values: RatingValues = { rating: [], confidence: [], finalRating: [] };
  for (const field of RATING_FIELDS) {
    const rule = rules[field];
    if (!rule) continue;
    for (const text of slotTexts) {
      const value = extractRating(text, rule);
      if (value !== undefined) values[field].push(value);
    }
  }
  return values;
}

export async function readDetailLink(row: PortalElement, profile: ConferenceProfile): Promise<string | null> {
  const rule = profile.rows.detailLink;
  if (!rule) return null;
  const raw = await row.attribute(rule.attribute);
  if (!raw) return null;
  const resolved = resolvePortalUrl(raw, profile.url);
  return resolved.valid ? resolved.parsed.toString() : null;
}
