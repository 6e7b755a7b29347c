// packages/core/src/stream/KeystreamSource.ts
import type { KeystreamGenerator } from '../keystream/KeystreamGenerator.js';
import type { Logger } from '../util/logger.js';

/**
 * Pull-based ReadableStream emitting exactly `length` keystream bytes in
 * chunks of at most `chunkSize`. Nothing is generated until the consumer
 * asks for it.
 */
export class KeystreamSource {
  constructor(
    private readonly gen: KeystreamGenerator,
    private readonly length: number,
    private readonly chunkSize: number,
    private readonly log?: Logger,
  ) {
    if (!Number.isSafeInteger(length) || length < 0) {
      throw new RangeError(`Keystream length must be a non-negative integer, got ${length}`);
    }
  }

  toReadableStream(): ReadableStream<Uint8Array> {
    let left = this.length;
    return new ReadableStream<Uint8Array>({
      pull: ctl => {
        if (left === 0) {
          this.log?.log(2, `keystream: emitted ${this.length} B`);
          ctl.close();
          return;
        }
        const n = Math.min(left, this.chunkSize);
        ctl.enqueue(this.gen.fill(new Uint8Array(n)));
        left -= n;
        if (this.log?.enabled(4)) this.log.log(4, `keystream: ${n} B (${left} B left)`);
      },
    }, { highWaterMark: 0 });
  }
}
