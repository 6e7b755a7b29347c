/* Shared key fixtures */
export const identityKey = () => Uint8Array.from({ length: 256 }, (_, i) => i);
export const reversedKey = () => Uint8Array.from({ length: 256 }, (_, i) => 255 - i);
export const stridedKey  = () => Uint8Array.from({ length: 256 }, (_, i) => (i * 7 + 3) & 0xff);

/** Deterministic filler, not a key. */
export const sampleData = (n: number) =>
  Uint8Array.from({ length: n }, (_, i) => (i * 31 + 7) & 0xff);

export const bytesOf = (s: string) => new TextEncoder().encode(s);

/** True when `sub` holds only values that also occur in `set`. */
export function valuesWithin(sub: Uint8Array, set: Uint8Array): boolean {
  const seen = new Uint8Array(256);
  for (const v of set) seen[v] = 1;
  return sub.every(v => seen[v] === 1);
}
