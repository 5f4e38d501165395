/**
 * Privacy types
 */

/**
 * HMAC digest algorithms accepted for pseudonyms.
 *
 * Only digests with at least 512 bits of output are allowed so that two
 * distinct identifiers practically never share a pseudonym.
 */
export type PseudonymAlgorithm = 'sha512' | 'sha3-512';

/**
 * Options for pseudonymizing identifiers
 */
export interface PseudonymOptions {
  /** Algorithm to use (default: sha512) */
  algorithm?: PseudonymAlgorithm;
}

/**
 * Result of a pseudonymization
 */
export interface PseudonymResult {
  /** The pseudonym (hex-encoded digest) */
  pseudonym: string;
  /** Algorithm used */
  algorithm: PseudonymAlgorithm;
}
