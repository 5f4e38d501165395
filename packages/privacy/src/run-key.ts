/**
 * Per-run secret key for pseudonymization.
 *
 * A RunKey is created once at the start of a processing run and passed
 * explicitly to every pseudonymization call. It is never persisted: every
 * serialization path (JSON, string coercion, util.inspect) yields a redaction
 * marker instead of the key material. Pseudonyms are therefore only stable
 * within one run.
 */

import { randomBytes } from 'crypto';
import { inspect } from 'util';

/** Key size in bytes (matches the SHA-512 output size) */
export const RUN_KEY_BYTES = 64;

const REDACTED = '[REDACTED]';

export class RunKey {
  readonly #material: Buffer;

  private constructor(material: Buffer) {
    this.#material = material;
  }

  /**
   * Generate a fresh random key.
   */
  static generate(): RunKey {
    return new RunKey(randomBytes(RUN_KEY_BYTES));
  }

  /**
   * Wrap existing key material. Intended for tests that need a fixed key.
   *
   * @throws Error if the material is empty
   */
  static fromBytes(material: Uint8Array): RunKey {
    if (material.length === 0) {
      throw new Error('RunKey material must not be empty');
    }
    return new RunKey(Buffer.from(material));
  }

  /** Key length in bytes */
  get length(): number {
    return this.#material.length;
  }

  /**
   * Expose the key material to a consumer (HMAC construction).
   * The buffer is a copy so callers cannot mutate the key.
   */
  use<T>(consumer: (material: Buffer) => T): T {
    return consumer(Buffer.from(this.#material));
  }

  toJSON(): string {
    return REDACTED;
  }

  toString(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return `RunKey ${REDACTED}`;
  }
}

/**
 * Create the key for one processing run.
 */
export function createRunKey(): RunKey {
  return RunKey.generate();
}
