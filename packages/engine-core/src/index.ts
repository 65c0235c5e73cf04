// Types
export type {
  NegotiationRole,
  PriceDirection,
  ConstraintSet,
  SatisfactionTier,
  Zopa,
} from './types.js';
export { EngineError } from './types.js';

// Roles
export { priceDirection, counterpartRole } from './role.js';

// Validation
export { validateConstraints } from './validation.js';

// Extraction
export {
  extractOffer,
  extractContextOffer,
  extractBareOffer,
  YEAR_RANGE,
} from './extraction/offer-extractor.js';
export { hasAcceptanceLanguage, extractAcceptedPrice } from './extraction/acceptance.js';

// Outcome scoring
export { computeZopa } from './outcome/zopa.js';
export { computeOutcomeUtility } from './outcome/utility.js';
export {
  satisfactionTier,
  deriveWinner,
  DEFAULT_SATISFACTION_THRESHOLDS,
} from './outcome/satisfaction.js';
export type { SatisfactionThresholds, Winner } from './outcome/satisfaction.js';

// Utils
export { clamp } from './utils.js';
