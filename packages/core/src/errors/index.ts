const DISABLE_STACKTRACE : boolean = true;

export class KeyswapError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

export class InvalidKeySizeError extends KeyswapError {
  constructor(readonly actual: number, readonly expected: number) {
    super(`invalid keysize (${actual}), expected exactly ${expected} bytes`);
  }
}

export class InvalidArgumentError extends KeyswapError {}

/** `key` failures abort like any runtime error; `input` failures get their own exit code. */
export type FileRole = 'key' | 'input';

export class FileOpenError extends KeyswapError {
  constructor(readonly path: string, readonly role: FileRole, reason?: string) {
    super(`could not open ${role === 'key' ? 'key-file' : 'file'} ${path}${reason ? `: ${reason}` : ''}`);
  }
}
