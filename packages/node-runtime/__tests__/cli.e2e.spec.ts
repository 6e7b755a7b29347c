import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { tmpdir } from 'node:os';
import { promises as fs } from 'node:fs';
import { execa } from 'execa';
import { identityKey, sampleData } from '../../core/__tests__/_keys.js';

/* ------------------------------------------------------------------ */
/*  Paths & runner                                                     */
/* ------------------------------------------------------------------ */
const HERE = dirname(fileURLToPath(import.meta.url));
const CLI  = resolve(HERE, '..', 'src', 'cli.ts');
const ROOT = resolve(HERE, '..', '..', '..');

// Node needs the tsx loader to run the TypeScript entry point
const run = (args: string[], input?: Uint8Array) =>
  execa(process.execPath, ['--import', 'tsx', CLI, ...args], {
    cwd      : ROOT,
    input    : input ? Buffer.from(input) : undefined,
    encoding : 'buffer',
    reject   : false,   // do not throw on exitCode ≠ 0
    stripFinalNewline: false,
  });

/* ------------------------------------------------------------------ */
/*  Tests                                                              */
/* ------------------------------------------------------------------ */
describe('keyswap (CLI binary)', () => {
  let dir: string, key: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'keyswap-e2e-'));
    key = join(dir, 'ident.key');
    await fs.writeFile(key, identityKey());
    await fs.writeFile(join(dir, 'bad.key'), new Uint8Array(100));
  });

  afterAll(() => fs.rm(dir, { recursive: true, force: true }));

  it('crypt | crypt round-trip over real pipes', async () => {
    const plain = sampleData(70_000);
    const enc = await run(['crypt', key], plain);
    expect(enc.exitCode).toBe(0);
    expect(enc.stdout.length).toBe(plain.length);

    const dec = await run(['crypt', key], enc.stdout);
    expect(dec.exitCode).toBe(0);
    expect(new Uint8Array(dec.stdout)).toEqual(plain);
  }, 30_000);

  it('keystream writes raw bytes and exits', async () => {
    const res = await run(['keystream', key, '5']);
    expect(res.exitCode).toBe(0);
    expect(Array.from(res.stdout)).toEqual([2, 5, 7, 13, 13]);
  }, 30_000);

  it('maps a bad key to exit code 3', async () => {
    const res = await run(['keystream', join(dir, 'bad.key'), '5']);
    expect(res.exitCode).toBe(3);
    expect(res.stderr.toString()).toBe(
      'Error [InvalidKeySizeError]: invalid keysize (100), expected exactly 256 bytes\n');
  }, 30_000);

  it('maps usage errors to exit code 1', async () => {
    const res = await run([]);
    expect(res.exitCode).toBe(1);
    expect(res.stderr.toString()).toMatch(/Usage: keyswap/);
  }, 30_000);
});
