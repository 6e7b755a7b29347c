// packages/node-runtime/src/program.ts
import { Command, CommanderError, Option } from 'commander';
import type { Readable, Writable } from 'node:stream';
import {
  Keyswap,
  FileOpenError,
  CHUNK_SIZE_ENV,
  DEFAULT_CHUNK_SIZE,
  MAX_CHUNK_SIZE,
  InvalidArgumentError,
  createLogger,
  parseByteCount,
  toVerbosity,
  type Logger,
  type Verbosity,
} from '../../core/src/index.js';
import { openInputs, readKeyFile } from './files.js';
import { toWebReadable, toWebWritable } from './streamAdapter.js';

export const PKG_VERSION = '1.0.0'; // sync with root package.json

export const EXIT = {
  OK      : 0,
  USAGE   : 1,
  OPEN    : 2,
  RUNTIME : 3,
} as const;

export interface CliIO {
  stdin  : Readable;
  stdout : Writable;
  stderr : Writable;
  env?   : Record<string, string | undefined>;
}

type GlobalOpts = {
  chunkSize? : number;
  verbose    : number;
};

interface Settings {
  chunkSize : number;
  verbose   : Verbosity;
  sink      : (msg: string) => void;
  log       : Logger;
}

function parseChunkSize(v: string): number {
  const n = parseByteCount(v, 'chunk size');
  if (n === 0 || n > MAX_CHUNK_SIZE) {
    throw new InvalidArgumentError(`chunk size must be between 1 and ${MAX_CHUNK_SIZE}, got ${n}`);
  }
  return n;
}

/* ------------------------------------------------------------------ */
/*  Program                                                            */
/* ------------------------------------------------------------------ */

function buildProgram(io: CliIO): Command {
  const program = new Command();

  // exitOverride/configureOutput/showHelpAfterError are inherited by the
  // subcommands, so they have to be set before those are added
  program
    .name('keyswap')
    .version(PKG_VERSION)
    .description(
      'Keyed byte shuffler: XOR data with a keystream seeded by a 256-byte key.\n' +
      'Not a secure cipher.')
    .exitOverride()
    .configureOutput({
      writeOut: s => { io.stdout.write(s); },
      writeErr: s => { io.stderr.write(s); },
    })
    .showHelpAfterError()

    .addOption(
      new Option('-c, --chunk-size <bytes>', 'I/O chunk size in bytes')
        .argParser(parseChunkSize)
    )

    // verbosity (repeatable)
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser((_: string, previous: number) => previous + 1)
    );

  const settings = (): Settings => {
    const opts = program.opts<GlobalOpts>();
    const fromEnv = io.env?.[CHUNK_SIZE_ENV];
    const chunkSize = opts.chunkSize
      ?? (fromEnv !== undefined ? parseChunkSize(fromEnv) : DEFAULT_CHUNK_SIZE);
    const verbose = toVerbosity(opts.verbose);
    const sink = (msg: string) => { io.stderr.write(msg + '\n'); };
    return { chunkSize, verbose, sink, log: createLogger(verbose, sink) };
  };

  const loadKeyswap = async (keyfile: string, opt: Settings) => {
    const key = await readKeyFile(keyfile);
    opt.log.log(1, `key loaded from ${keyfile}`);
    return new Keyswap(key, {
      chunkSize : opt.chunkSize,
      verbose   : opt.verbose,
      logger    : opt.sink,
    });
  };

  const out = () => toWebWritable(io.stdout);

  program
    .command('crypt')
    .argument('<keyfile>', 'file holding exactly 256 key bytes')
    .description('XOR STDIN with the keystream and write to STDOUT (encrypts and decrypts)')
    .action(async (keyfile: string) => {
      const opt = settings();
      const ks  = await loadKeyswap(keyfile, opt);
      await toWebReadable(io.stdin)
        .pipeThrough(ks.createCryptStream())
        .pipeTo(out(), { preventClose: true });
    });

  program
    .command('keystream')
    .argument('<keyfile>', 'file holding exactly 256 key bytes')
    .argument('<length>', 'number of keystream bytes to write')
    .description('Write <length> raw keystream bytes to STDOUT')
    .action(async (keyfile: string, length: string) => {
      const opt = settings();
      const ks  = await loadKeyswap(keyfile, opt);
      const n   = parseByteCount(length);
      await ks.createKeystreamStream(n).pipeTo(out(), { preventClose: true });
    });

  program
    .command('xor')
    .argument('<file_a>', 'first input file')
    .argument('<file_b>', 'second input file')
    .description('Write the byte-wise XOR of two files to STDOUT, cut to the shorter one')
    .action(async (fileA: string, fileB: string) => {
      const opt    = settings();
      const [a, b] = await openInputs([fileA, fileB], opt.chunkSize);
      opt.log.log(1, `xor ${fileA} with ${fileB}`);
      await Keyswap.createXorStream(a, b, { verbose: opt.verbose, logger: opt.sink })
        .pipeTo(out(), { preventClose: true });
    });

  return program;
}

/* ------------------------------------------------------------------ */
/*  Error boundary                                                     */
/* ------------------------------------------------------------------ */

export function formatError(err: unknown): string {
  if (err instanceof Error) return `Error [${err.name}]: ${err.message}\n`;
  return `Error [Unknown]: ${String(err)}\n`;
}

function exitCodeFor(err: unknown): number {
  if (err instanceof FileOpenError && err.role === 'input') return EXIT.OPEN;
  return EXIT.RUNTIME;
}

/**
 * Run the CLI against the given streams and resolve to the exit code.
 * Never rejects: every failure ends up as a message on `io.stderr`.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const program = buildProgram(io);
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return EXIT.OK;
  } catch (err) {
    // commander has already printed the message and usage text
    if (err instanceof CommanderError) return err.exitCode === 0 ? EXIT.OK : EXIT.USAGE;
    io.stderr.write(formatError(err));
    return exitCodeFor(err);
  }
}
