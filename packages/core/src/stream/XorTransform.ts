// packages/core/src/stream/XorTransform.ts
import type { KeystreamGenerator } from '../keystream/KeystreamGenerator.js';
import { toUint8Array } from '../util/convert.js';
import type { Logger } from '../util/logger.js';

/**
 * TransformStream that XORs every incoming byte with the next keystream
 * byte. Chunk boundaries do not matter: the generator simply carries on
 * where the previous chunk stopped.
 */
export class XorTransform {
  private processed = 0;

  constructor(
    private readonly gen: KeystreamGenerator,
    private readonly log?: Logger,
  ) {}

  toTransformStream(): TransformStream<Uint8Array | ArrayBuffer, Uint8Array> {
    return new TransformStream<Uint8Array | ArrayBuffer, Uint8Array>({
      transform: (chunk, ctl) => {
        const bytes = toUint8Array(chunk);
        if (!bytes.length) return;
        ctl.enqueue(this.gen.xorInto(bytes));
        this.processed += bytes.length;
        if (this.log?.enabled(4)) this.log.log(4, `xor: ${bytes.length} B (total ${this.processed} B)`);
      },
      flush: () => {
        this.log?.log(2, `xor: done after ${this.processed} B`);
      },
    });
  }
}
