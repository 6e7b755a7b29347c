// packages/node-runtime/src/index.ts
import { Keyswap, type KeyswapOptions } from '../../core/src/index.js';
import { readKeyFile } from './files.js';

/** Build a Keyswap from a key file on disk. */
export async function createKeyswap(keyfile: string, cfg?: KeyswapOptions): Promise<Keyswap> {
  return new Keyswap(await readKeyFile(keyfile), cfg);
}

export * from '../../core/src/index.js';
export { readKeyFile, openInputs } from './files.js';
export { runCli, EXIT, type CliIO } from './program.js';
export { toWebReadable, toWebWritable } from './streamAdapter.js';
