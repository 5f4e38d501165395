/**
 * @hubanon/privacy
 *
 * Privacy primitives for publishing activity data:
 * - Ephemeral per-run secret keys
 * - Keyed (HMAC) pseudonymization of identifiers
 * - k-Anonymity threshold checks
 */

export const PRIVACY_VERSION = '0.1.0';

// Run keys
export { RunKey, createRunKey, RUN_KEY_BYTES } from './run-key.js';

// Pseudonymization
export { pseudonymize, pseudonymizeIdentifier, DEFAULT_PSEUDONYM_ALGORITHM } from './hash.js';

// k-Anonymity primitives
export {
  DEFAULT_K_THRESHOLD,
  assertValidThreshold,
  checkKAnonymity,
  meetsKAnonymity,
  type KAnonymityResult,
  type KAnonymityOptions,
} from './k-anonymity.js';

// Types
export type { PseudonymAlgorithm, PseudonymOptions, PseudonymResult } from './types.js';
