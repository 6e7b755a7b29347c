import { InvalidArgumentError } from '../errors/index.js';

/**
 * Parse a byte count given as plain decimal digits.
 * @throws {InvalidArgumentError} on anything else, or above 2^53 - 1
 */
export function parseByteCount(text: string, what = 'length'): number {
  if (!/^\d+$/.test(text)) {
    throw new InvalidArgumentError(`${what} must be a non-negative integer, got '${text}'`);
  }
  const n = Number(text);
  if (!Number.isSafeInteger(n)) {
    throw new InvalidArgumentError(`${what} too large: ${text}`);
  }
  return n;
}
