import { isHexError } from '../src/diagnostics/errors.js';
import type { DiagnosticId } from '../src/diagnostics/types.js';

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}

/**
 * Diagnostic ID of the error thrown by `fn`, or `undefined` when it is not a codec error.
 */
export function hexErrorId(fn: () => unknown): DiagnosticId | undefined {
  const err = thrownBy(fn);
  return isHexError(err) ? err.id : undefined;
}

/** Deterministic byte sequence for fixtures (xorshift32). */
export function pseudoRandomBytes(length: number, seed = 0x2545f491): Uint8Array {
  const out = new Uint8Array(length);
  let x = seed >>> 0;
  for (let i = 0; i < length; i++) {
    x ^= x << 13;
    x >>>= 0;
    x ^= x >>> 17;
    x ^= x << 5;
    x >>>= 0;
    out[i] = x & 0xff;
  }
  return out;
}
