// packages/core/src/index.ts

import { KEY_SIZE, DEFAULT_CHUNK_SIZE, MAX_CHUNK_SIZE } from './config/defaults.js';
import { KeystreamGenerator } from './keystream/KeystreamGenerator.js';
import { StreamProcessor }    from './stream/StreamProcessor.js';
import { zipXorStreams }      from './stream/zipXorStreams.js';
import { xorBytes }           from './util/bytes.js';
import { InvalidArgumentError, InvalidKeySizeError } from './errors/index.js';
import {
  createLogger,
  type Verbosity,
  type Logger,
} from './util/logger.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring Keyswap instance behavior.
 */
export interface KeyswapOptions {
  /** Size of the chunks emitted by keystream streams; never changes the bytes */
  chunkSize? : number;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?   : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?    : (msg: string) => void;
}

/**
 * Keyswap bundles a 256-byte key with the three operating modes.
 *
 * Every operation starts from a fresh generator, so `crypt()` applied twice
 * gives back the input and `keystream(n)` always returns the same prefix.
 */
export class Keyswap {
  private readonly key       : Uint8Array;
  private readonly chunkSize : number;
  private readonly stream    : StreamProcessor;

  // — diagnostics ------------------------------------------------------------
  private readonly log : Logger;

  /**
   * @param key - exactly 256 bytes; copied, never modified
   * @throws {InvalidKeySizeError} for any other key length
   * @throws {InvalidArgumentError} for a chunk size outside 1…64 MiB
   */
  constructor(key: Uint8Array, opt: KeyswapOptions = {}) {
    if (key.length !== KEY_SIZE) throw new InvalidKeySizeError(key.length, KEY_SIZE);
    this.key       = Uint8Array.from(key);
    this.chunkSize = Keyswap.checkChunkSize(opt.chunkSize ?? DEFAULT_CHUNK_SIZE);
    this.log       = createLogger(opt.verbose ?? 0, opt.logger);
    this.stream    = new StreamProcessor(this.key, this.chunkSize, this.log);

    this.log.log(2, `keyswap: key accepted, chunk size ${this.chunkSize} B`);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - In-memory helpers
  // ════════════════════════════════════════════════════════════════════════

  /** XOR `data` with the keystream. Encrypts and decrypts alike. */
  crypt(data: Uint8Array): Uint8Array {
    this.log.log(3, `crypt: ${data.length} B in memory`);
    return new KeystreamGenerator(this.key).xorInto(data);
  }

  /** The first `length` keystream bytes. */
  keystream(length: number): Uint8Array {
    return new KeystreamGenerator(this.key).fill(new Uint8Array(Keyswap.checkLength(length)));
  }

  /** XOR of two buffers, truncated to the shorter one. */
  static xor(a: Uint8Array, b: Uint8Array): Uint8Array {
    return xorBytes(a, b);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Streaming API
  // ════════════════════════════════════════════════════════════════════════

  createCryptStream(): TransformStream<Uint8Array | ArrayBuffer, Uint8Array> {
    this.log.log(2, 'crypt: stream opened');
    return this.stream.cryptStream();
  }

  createKeystreamStream(length: number): ReadableStream<Uint8Array> {
    this.log.log(2, `keystream: stream of ${length} B opened`);
    return this.stream.keystreamStream(Keyswap.checkLength(length));
  }

  /** Streaming counterpart of {@link Keyswap.xor}. */
  static createXorStream(
    a: ReadableStream<Uint8Array>,
    b: ReadableStream<Uint8Array>,
    opt: Pick<KeyswapOptions, 'verbose' | 'logger'> = {},
  ): ReadableStream<Uint8Array> {
    return zipXorStreams(a, b, createLogger(opt.verbose ?? 0, opt.logger));
  }

  /** Drain a stream, optionally through a transform, into one buffer. */
  collect(
    readable: ReadableStream<Uint8Array>,
    transform?: TransformStream<Uint8Array | ArrayBuffer, Uint8Array>,
  ): Promise<Uint8Array> {
    return this.stream.collect(readable, transform);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PRIVATE
  // ════════════════════════════════════════════════════════════════════════

  private static checkLength(n: number): number {
    if (!Number.isSafeInteger(n) || n < 0) {
      throw new InvalidArgumentError(`length must be a non-negative integer, got ${n}`);
    }
    return n;
  }

  private static checkChunkSize(n: number): number {
    if (!Number.isInteger(n) || n <= 0 || n > MAX_CHUNK_SIZE) {
      throw new InvalidArgumentError(`chunk size must be an integer between 1 and ${MAX_CHUNK_SIZE}, got ${n}`);
    }
    return n;
  }
}

export { KeystreamGenerator } from './keystream/KeystreamGenerator.js';
export { KeystreamCursor, keystream, take, zipXor } from './keystream/KeystreamCursor.js';
export { parseByteCount } from './util/parse.js';
export { KEY_SIZE, DEFAULT_CHUNK_SIZE, MAX_CHUNK_SIZE, CHUNK_SIZE_ENV } from './config/defaults.js';
export {
  KeyswapError,
  InvalidKeySizeError,
  InvalidArgumentError,
  FileOpenError,
  type FileRole,
} from './errors/index.js';
export { createLogger, toVerbosity, type Logger, type Verbosity } from './util/logger.js';
