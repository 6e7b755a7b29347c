// packages/node-runtime/src/files.ts
import { open, type FileHandle } from 'node:fs/promises';
import {
  FileOpenError,
  InvalidKeySizeError,
  KEY_SIZE,
  type FileRole,
} from '../../core/src/index.js';
import { toWebReadable } from './streamAdapter.js';

function reasonOf(err: unknown): string {
  if (err instanceof Error) {
    return 'code' in err && typeof err.code === 'string' ? err.code : err.message;
  }
  return String(err);
}

async function openFile(path: string, role: FileRole): Promise<FileHandle> {
  try {
    return await open(path, 'r');
  } catch (err) {
    throw new FileOpenError(path, role, reasonOf(err));
  }
}

/**
 * Read a key file as raw bytes. The file must hold exactly 256 bytes;
 * shorter or longer files are rejected rather than padded or cut.
 */
export async function readKeyFile(path: string): Promise<Uint8Array> {
  const handle = await openFile(path, 'key');
  try {
    // one spare byte tells "exactly 256" apart from "longer"
    const buf = new Uint8Array(KEY_SIZE + 1);
    let got = 0;
    while (got < buf.length) {
      let bytesRead: number;
      try {
        ({ bytesRead } = await handle.read(buf, got, buf.length - got, null));
      } catch (err) {
        throw new FileOpenError(path, 'key', reasonOf(err));
      }
      if (bytesRead === 0) break;
      got += bytesRead;
    }

    if (got > KEY_SIZE) {
      const { size } = await handle.stat();
      throw new InvalidKeySizeError(Math.max(size, got), KEY_SIZE);
    }
    if (got < KEY_SIZE) throw new InvalidKeySizeError(got, KEY_SIZE);

    return buf.slice(0, KEY_SIZE);
  } finally {
    await handle.close();
  }
}

/** Open a path for streaming; anything but a regular file is refused. */
async function openInput(path: string): Promise<FileHandle> {
  const handle = await openFile(path, 'input');
  let reason: string | undefined;
  try {
    const st = await handle.stat();
    if (st.isDirectory()) reason = 'EISDIR';
    else if (!st.isFile()) reason = 'not a regular file';
  } catch (err) {
    reason = reasonOf(err);
  }
  if (reason === undefined) return handle;
  await handle.close();
  throw new FileOpenError(path, 'input', reason);
}

/**
 * Open every path for streaming. Either all of them open, or the ones
 * that did are closed again and the first failure is thrown.
 */
export async function openInputs(
  paths: readonly string[],
  chunkSize: number,
): Promise<ReadableStream<Uint8Array>[]> {
  const settled = await Promise.allSettled(paths.map(openInput));

  const handles: FileHandle[] = [];
  const failures: FileOpenError[] = [];
  for (const [i, r] of settled.entries()) {
    if (r.status === 'fulfilled') handles.push(r.value);
    else if (r.reason instanceof FileOpenError) failures.push(r.reason);
    else failures.push(new FileOpenError(paths[i], 'input', reasonOf(r.reason)));
  }

  if (failures.length) {
    await Promise.all(handles.map(h => h.close()));
    throw failures[0];
  }

  return handles.map(h =>
    toWebReadable(h.createReadStream({ highWaterMark: chunkSize })));
}
