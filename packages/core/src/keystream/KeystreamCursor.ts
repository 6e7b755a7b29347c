// packages/core/src/keystream/KeystreamCursor.ts
import { KeystreamGenerator } from './KeystreamGenerator.js';

/**
 * Infinite, single-pass view of a keystream.
 *
 * `current` is the byte generated last; constructing a cursor already
 * generates the first one. It cannot be rewound, only rebuilt from the key.
 */
export class KeystreamCursor implements IterableIterator<number> {
  readonly #gen: KeystreamGenerator;
  #current: number;

  constructor(key: Uint8Array) {
    this.#gen     = new KeystreamGenerator(key);
    this.#current = this.#gen.next();
  }

  get current(): number {
    return this.#current;
  }

  advance(): this {
    this.#current = this.#gen.next();
    return this;
  }

  /** Same working key and same position. */
  equals(other: KeystreamCursor): boolean {
    if (this.#gen.position !== other.#gen.position) return false;
    const a = this.#gen.snapshot();
    const b = other.#gen.snapshot();
    return a.every((v, i) => v === b[i]);
  }

  next(): IteratorResult<number> {
    const value = this.#current;
    this.advance();
    return { value, done: false };
  }

  [Symbol.iterator](): this {
    return this;
  }
}

/* ------------------------------------------------------------------ */
/*  Sequence helpers                                                   */
/* ------------------------------------------------------------------ */

export function* keystream(key: Uint8Array): Generator<number, never, undefined> {
  const gen = new KeystreamGenerator(key);
  for (;;) yield gen.next();
}

export function* take(source: Iterable<number>, n: number): Generator<number, void, undefined> {
  if (n <= 0) return;
  let left = n;
  for (const b of source) {
    yield b;
    if (--left === 0) return;
  }
}

/**
 * Positional XOR of two byte sequences. Stops as soon as either side runs
 * out, so the shorter one decides the length.
 */
export function* zipXor(a: Iterable<number>, b: Iterable<number>): Generator<number, void, undefined> {
  const ia = a[Symbol.iterator]();
  const ib = b[Symbol.iterator]();
  try {
    for (;;) {
      const x = ia.next();
      if (x.done) return;
      const y = ib.next();
      if (y.done) return;
      yield (x.value ^ y.value) & 0xff;
    }
  } finally {
    ia.return?.();
    ib.return?.();
  }
}
