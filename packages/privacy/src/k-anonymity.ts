/**
 * k-Anonymity primitives
 *
 * Counting-based threshold checks used to suppress groups (here: hour
 * buckets) that are too small to hide an individual.
 *
 * Design decisions:
 * - Simple boolean k-check (meets threshold or not)
 * - Small groups are suppressed, never merged or generalized
 * - NO differential privacy (no noise)
 */

/**
 * Default minimum number of entries a group must have to be released.
 */
export const DEFAULT_K_THRESHOLD = 5;

/**
 * Result of a k-anonymity check
 */
export interface KAnonymityResult {
  /** Whether the group meets the k-anonymity threshold */
  meetsThreshold: boolean;
  /** Number of members in the group */
  groupSize: number;
  /** The k threshold that was checked against */
  kThreshold: number;
  /** Members missing to reach the threshold (0 when met) */
  shortfall: number;
}

/**
 * Options for k-anonymity checking
 */
export interface KAnonymityOptions {
  /** Minimum group size required (default: 5) */
  kThreshold?: number;
}

/**
 * Validate a threshold value
 *
 * @throws RangeError if the threshold is not a positive integer
 */
export function assertValidThreshold(kThreshold: number): void {
  if (!Number.isInteger(kThreshold) || kThreshold < 1) {
    throw new RangeError(`k threshold must be a positive integer, got ${kThreshold}`);
  }
}

/**
 * Check if a group size meets the k-anonymity threshold
 */
export function checkKAnonymity(
  groupSize: number,
  options: KAnonymityOptions = {}
): KAnonymityResult {
  const kThreshold = options.kThreshold ?? DEFAULT_K_THRESHOLD;
  assertValidThreshold(kThreshold);

  return {
    meetsThreshold: groupSize >= kThreshold,
    groupSize,
    kThreshold,
    shortfall: Math.max(kThreshold - groupSize, 0),
  };
}

/**
 * Simple boolean check for k-anonymity
 */
export function meetsKAnonymity(
  groupSize: number,
  kThreshold: number = DEFAULT_K_THRESHOLD
): boolean {
  return checkKAnonymity(groupSize, { kThreshold }).meetsThreshold;
}
