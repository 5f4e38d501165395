/**
 * Keyed pseudonymization of identifiers
 *
 * Identifiers are replaced with HMAC digests under a per-run RunKey.
 * Without the key the mapping cannot be reversed or recomputed, and since the
 * key is discarded at the end of the run nobody holds it afterwards.
 */

import { createHmac } from 'crypto';
import type { RunKey } from './run-key.js';
import type { PseudonymAlgorithm, PseudonymOptions, PseudonymResult } from './types.js';

export const DEFAULT_PSEUDONYM_ALGORITHM: PseudonymAlgorithm = 'sha512';

/**
 * Pseudonymize an identifier
 *
 * @param value - Raw identifier (hashed as UTF-8 bytes, not normalized)
 * @param key - Secret key of the current run
 * @returns Pseudonym result
 */
export function pseudonymizeIdentifier(
  value: string,
  key: RunKey,
  options: PseudonymOptions = {}
): PseudonymResult {
  const algorithm = options.algorithm ?? DEFAULT_PSEUDONYM_ALGORITHM;

  const pseudonym = key.use((material) =>
    createHmac(algorithm, material).update(value, 'utf8').digest('hex')
  );

  return { pseudonym, algorithm };
}

/**
 * Shorthand returning only the hex pseudonym
 */
export function pseudonymize(value: string, key: RunKey, options: PseudonymOptions = {}): string {
  return pseudonymizeIdentifier(value, key, options).pseudonym;
}
