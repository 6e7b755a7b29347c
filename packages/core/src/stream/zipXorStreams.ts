// packages/core/src/stream/zipXorStreams.ts
import type { Logger } from '../util/logger.js';

const EMPTY = new Uint8Array(0);

/**
 * Byte-wise XOR of two finite streams.
 *
 * Output stops as soon as either side is exhausted and the other side is
 * cancelled, so streams of different length truncate to the shorter one.
 * Each side is only read when its buffered bytes are used up.
 */
export function zipXorStreams(
  a: ReadableStream<Uint8Array>,
  b: ReadableStream<Uint8Array>,
  log?: Logger,
): ReadableStream<Uint8Array> {
  const ra = a.getReader();
  const rb = b.getReader();
  let bufA: Uint8Array = EMPTY;
  let bufB: Uint8Array = EMPTY;
  let total = 0;

  const cancelBoth = (reason?: unknown) =>
    Promise.all([ra.cancel(reason), rb.cancel(reason)]);

  return new ReadableStream<Uint8Array>({
    async pull(ctl) {
      try {
        while (!bufA.length) {
          const r = await ra.read();
          if (r.done) {
            log?.log(2, `xor: first source ended after ${total} B`);
            await cancelBoth();
            ctl.close();
            return;
          }
          bufA = r.value;
        }
        while (!bufB.length) {
          const r = await rb.read();
          if (r.done) {
            log?.log(2, `xor: second source ended after ${total} B`);
            await cancelBoth();
            ctl.close();
            return;
          }
          bufB = r.value;
        }

        const n   = Math.min(bufA.length, bufB.length);
        const out = new Uint8Array(n);
        for (let i = 0; i < n; i++) out[i] = bufA[i] ^ bufB[i];
        bufA = bufA.subarray(n);
        bufB = bufB.subarray(n);
        total += n;
        ctl.enqueue(out);
      } catch (err) {
        // a failed read must still release the other side
        await Promise.allSettled([ra.cancel(err), rb.cancel(err)]);
        throw err;
      }
    },
    cancel(reason) {
      return cancelBoth(reason).then(() => undefined);
    },
  }, { highWaterMark: 0 });
}
