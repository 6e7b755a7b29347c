// packages/core/src/util/convert.ts
export function toUint8Array(src: Uint8Array | ArrayBuffer): Uint8Array {
  if (src instanceof Uint8Array) return src;
  return new Uint8Array(src);
}
