// packages/core/src/stream/StreamProcessor.ts
import { KeystreamGenerator } from '../keystream/KeystreamGenerator.js';
import { XorTransform }       from './XorTransform.js';
import { KeystreamSource }    from './KeystreamSource.js';
import { DEFAULT_CHUNK_SIZE } from '../config/defaults.js';
import { collectStream }      from '../util/stream.js';
import type { Logger }        from '../util/logger.js';

/**
 * Builds the keyed pipelines (crypt, keystream). Each pipeline gets its
 * own generator, started from the initial key state.
 */
export class StreamProcessor {
  constructor(
    private readonly key: Uint8Array,
    private readonly chunkSize = DEFAULT_CHUNK_SIZE,
    private readonly log?: Logger,
  ) {}

  cryptStream(): TransformStream<Uint8Array | ArrayBuffer, Uint8Array> {
    return new XorTransform(new KeystreamGenerator(this.key), this.log)
      .toTransformStream();
  }

  keystreamStream(length: number): ReadableStream<Uint8Array> {
    return new KeystreamSource(
      new KeystreamGenerator(this.key),
      length,
      this.chunkSize,
      this.log,
    ).toReadableStream();
  }

  async collect(
    readable: ReadableStream<Uint8Array>,
    transform?: TransformStream<Uint8Array | ArrayBuffer, Uint8Array>,
  ): Promise<Uint8Array> {
    return collectStream(transform ? readable.pipeThrough(transform) : readable);
  }
}
