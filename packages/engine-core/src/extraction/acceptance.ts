import { extractContextOffer } from './offer-extractor.js';

const ACCEPTANCE_PATTERN = /\b(?:deal|accept(?:ed|s)?|agree(?:d|s)?|sold|take it)\b/i;

const NEGATED_PATTERN =
  /\bno deal\b|\b(?:not|don't|do not|can't|cannot|won't|will not|couldn't)\s+(?:\w+\s+)?(?:accept|agree|take it)\b/i;

/** "If you agree…", "would you accept…", "will you take it…": a proposal, not an acceptance. */
const CONDITIONAL_PATTERN =
  /\b(?:if|would|will|could|can|do)\s+(?:you|we)\b[^.!?]*?\b(?:deal|accept|agree|take it)/i;

/** Sentence breaks: terminal punctuation followed by whitespace, so "$715.50" stays whole. */
const SENTENCE_BREAK = /(?<=[.!?])\s+/;

function isAccepting(sentence: string): boolean {
  return (
    !sentence.endsWith('?') &&
    ACCEPTANCE_PATTERN.test(sentence) &&
    !NEGATED_PATTERN.test(sentence) &&
    !CONDITIONAL_PATTERN.test(sentence)
  );
}

/** First sentence of the message that accepts outright. */
function acceptingSentence(message: string): string | null {
  const sentences = message.split(SENTENCE_BREAK).map((s) => s.trim());
  return sentences.find(isAccepting) ?? null;
}

/**
 * True when some sentence of the message accepts outright: acceptance
 * language that is not negated, not asked as a question ("deal?") and not
 * conditional ("if you agree to $760").
 */
export function hasAcceptanceLanguage(message: string): boolean {
  return acceptingSentence(message) !== null;
}

/**
 * Acceptance paired with a context-word price, e.g. "I agree to $715".
 * The accepting sentence's own price wins over one elsewhere in the message.
 * Bare numbers never count here, so item descriptors ("2018 Civic") are ignored.
 */
export function extractAcceptedPrice(message: string): number | null {
  const sentence = acceptingSentence(message);
  if (sentence === null) {
    return null;
  }
  return extractContextOffer(sentence) ?? extractContextOffer(message);
}
