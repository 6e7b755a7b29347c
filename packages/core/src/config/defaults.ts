/** Keys are exactly this many raw bytes. */
export const KEY_SIZE = 256 as const;

export const DEFAULT_CHUNK_SIZE = 64 * 1024;
export const MAX_CHUNK_SIZE     = 64 * 1024 * 1024; // 64 MiB

/** Overrides DEFAULT_CHUNK_SIZE for the CLI when no --chunk-size is given. */
export const CHUNK_SIZE_ENV = 'KEYSWAP_CHUNK_SIZE';
