import type { DiagnosticId } from './types.js';
import { DiagnosticIds } from './types.js';

/**
 * Base class for errors raised by the codec and the segment model.
 *
 * Every instance carries a stable diagnostic ID so callers can map it onto a {@link Diagnostic}.
 */
export class HexError extends Error {
  readonly id: DiagnosticId;
  /** 1-based input line, for errors raised while parsing a HEX stream. */
  readonly line?: number;

  constructor(message: string, id: DiagnosticId, options?: { line?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'HexError';
    this.id = id;
    if (options?.line !== undefined) {
      this.line = options.line;
    }
  }
}

/**
 * A value or computed quantity does not fit its target field, address space or format.
 */
export class HexRangeError extends HexError {
  constructor(message: string, id: DiagnosticId = DiagnosticIds.RangeError) {
    super(message, id);
    this.name = 'HexRangeError';
  }
}

/**
 * Malformed input or configuration: bad checksum, bad length, unknown record type, etc.
 */
export class HexValueError extends HexError {
  constructor(
    message: string,
    id: DiagnosticId = DiagnosticIds.ValueError,
    options?: { line?: number; cause?: unknown },
  ) {
    super(message, id, options);
    this.name = 'HexValueError';
  }
}

export function isHexError(err: unknown): err is HexError {
  return err instanceof HexError;
}

/**
 * Human-readable message for any thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
