#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { stdout, stderr, env, exit as processExit } from 'node:process';
import { EXIT, formatError, runCli } from './program.js';

function die(err: unknown): never {
  stderr.write(formatError(err));
  processExit(EXIT.RUNTIME);
}

process.on('uncaughtException', die);
process.on('unhandledRejection', die);

runCli(process.argv.slice(2), {
  // only touched by `crypt`, so other modes never hold STDIN open
  get stdin() { return process.stdin; },
  stdout,
  stderr,
  env,
}).then(code => { process.exitCode = code; }, die);
