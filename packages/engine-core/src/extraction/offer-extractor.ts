/**
 * Heuristic price extraction from free-form negotiation text.
 *
 * Known false negatives: prices written out in words, prices under 100 with no
 * context word, prices inside the 2000–2030 range with no context word.
 * Known false positives: context-adjacent numbers that are not prices
 * ("for 3 years"), quoted counterpart prices ("you said $800").
 */

/** Inclusive range of numbers treated as calendar years by the bare-number rule. */
export const YEAR_RANGE = { min: 2000, max: 2030 } as const;

const AMOUNT = String.raw`(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)`;

/**
 * High-confidence rule: a number next to a negotiation-context marker.
 * Markers are "at", "for", "offer", "price", "pay", a leading "$", or a
 * trailing "dollars".
 */
const CONTEXT_PATTERN = new RegExp(
  String.raw`\b(?:at|for|offer|price|pay)\s+\$?\s*${AMOUNT}` +
    String.raw`|\$\s*${AMOUNT}` +
    String.raw`|\b${AMOUNT}\s*dollars?\b`,
  'gi',
);

/** Fallback rule: any standalone 3–4 digit number. */
const BARE_NUMBER_PATTERN = /(?<![\d.,$])\b(\d{3,4})\b(?![.,]\d)/g;

function parseAmount(raw: string): number | null {
  const value = Number.parseFloat(raw.replace(/,/g, ''));
  return Number.isFinite(value) ? value : null;
}

function isYearShaped(value: number): boolean {
  return Number.isInteger(value) && value >= YEAR_RANGE.min && value <= YEAR_RANGE.max;
}

/**
 * Context-word rule alone. Returns the first context-adjacent amount in the
 * message, or null. Used on its own wherever bare numbers must not count.
 */
export function extractContextOffer(message: string): number | null {
  for (const match of message.matchAll(CONTEXT_PATTERN)) {
    const raw = match[1] ?? match[2] ?? match[3];
    if (raw === undefined) continue;
    const value = parseAmount(raw);
    if (value !== null) return value;
  }
  return null;
}

/** Bare-number rule alone. Skips year-shaped numbers. */
export function extractBareOffer(message: string): number | null {
  for (const match of message.matchAll(BARE_NUMBER_PATTERN)) {
    const value = parseAmount(match[1]);
    if (value !== null && !isYearShaped(value)) return value;
  }
  return null;
}

/**
 * Extract zero or one price candidate from a message. Ordered rules, first
 * rule with any match wins, taking its first occurrence.
 */
export function extractOffer(message: string): number | null {
  return extractContextOffer(message) ?? extractBareOffer(message);
}
