// packages/core/src/keystream/KeystreamGenerator.ts
import { KEY_SIZE } from '../config/defaults.js';
import { InvalidKeySizeError } from '../errors/index.js';

const BYTE_MASK = 0xff;

/**
 * Keyed pseudorandom byte generator.
 *
 * The working key is a private copy that gets shuffled on every step, so
 * it always stays a permutation of the original key. Output bytes are read
 * back out of that permutation, which means the keystream only ever
 * contains values that occur in the key. Not a secure cipher.
 *
 * Usage:
 * ```typescript
 * const gen = new KeystreamGenerator(key);
 * const first = gen.next();
 * ```
 */
export class KeystreamGenerator {
  readonly #key: Uint8Array;
  /** Steps taken so far; the step index is this value mod 256. */
  #position = 0;
  #accumulator = 0;

  /**
   * @throws {InvalidKeySizeError} unless the key is exactly 256 bytes
   */
  constructor(key: Uint8Array) {
    if (key.length !== KEY_SIZE) {
      throw new InvalidKeySizeError(key.length, KEY_SIZE);
    }
    this.#key = Uint8Array.from(key);
  }

  /** Produce one byte and advance the state. */
  next(): number {
    const k = this.#key;

    // 1, 2, …, 255, 0, 1, …
    const h = ++this.#position & BYTE_MASK;
    const q = this.#accumulator = (this.#accumulator + k[h]) & BYTE_MASK;

    const tmp = k[h];
    k[h] = k[q];
    k[q] = tmp;

    return k[(k[h] + k[q]) & BYTE_MASK];
  }

  /** Fill `out` with the next `out.length` keystream bytes. */
  fill(out: Uint8Array): Uint8Array {
    for (let i = 0; i < out.length; i++) out[i] = this.next();
    return out;
  }

  /**
   * XOR the next `data.length` keystream bytes over `data`.
   * Writes into `out` (may be `data` itself) or a fresh array.
   */
  xorInto(data: Uint8Array, out: Uint8Array = new Uint8Array(data.length)): Uint8Array {
    if (out.length < data.length) {
      throw new RangeError(`Output buffer (${out.length} B) smaller than input (${data.length} B)`);
    }
    for (let i = 0; i < data.length; i++) out[i] = data[i] ^ this.next();
    return out;
  }

  get position(): number {
    return this.#position;
  }

  /** Copy of the current working key. */
  snapshot(): Uint8Array {
    return Uint8Array.from(this.#key);
  }
}
