import { DiagnosticIds } from '../diagnostics/types.js';
import { HexValueError } from '../diagnostics/errors.js';
import { isValidChecksum } from './checksum.js';
import { recordBytesToLine } from './encode.js';
import type { RecordType, StartSegmentAddress } from './types.js';
import { recordTypeFromByte } from './types.js';

/** Shortest record: mark, byte count, address, type and checksum. */
const MIN_RECORD_CHARS = 11;

function nibble(code: number): number {
  if (code >= 0x30 && code <= 0x39) return code - 0x30;
  if (code >= 0x41 && code <= 0x46) return code - 0x41 + 10;
  if (code >= 0x61 && code <= 0x66) return code - 0x61 + 10;
  throw new HexValueError(
    `Failed to convert character '${String.fromCharCode(code)}' (code ${code}) to a hex digit.`,
    DiagnosticIds.InvalidHexDigit,
  );
}

function readHexByte(source: string, index: number): number {
  return (nibble(source.charCodeAt(index)) << 4) | nibble(source.charCodeAt(index + 1));
}

function startCodePoint(startCode: string): number {
  if (startCode.length !== 1) {
    throw new HexValueError(
      `The start code must be exactly 1 character long, got ${startCode.length} - string: '${startCode}'`,
      DiagnosticIds.InvalidStartCode,
    );
  }
  return startCode.charCodeAt(0);
}

/**
 * One decoded record: the raw bytes `len, addrHi, addrLo, type, payload…, checksum`.
 *
 * Construction validates the checksum and the length byte and classifies the record type.
 */
export class HexRecord {
  readonly bytes: Uint8Array;
  readonly recordType: RecordType;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.validate();
    const type = recordTypeFromByte(bytes[3] ?? -1);
    if (type === undefined) {
      throw new HexValueError(
        `Unknown record type! Expected: [0-5] Got: ${bytes[3] ?? 'none'}`,
        DiagnosticIds.UnknownRecordType,
      );
    }
    this.recordType = type;
  }

  get byteCount(): number {
    return this.bytes[0] ?? 0;
  }

  /** The 16-bit address field of the record. */
  get address(): number {
    return ((this.bytes[1] ?? 0) << 8) | (this.bytes[2] ?? 0);
  }

  get payload(): Uint8Array {
    return this.bytes.subarray(4, this.bytes.length - 1);
  }

  get checksum(): number {
    return this.bytes[this.bytes.length - 1] ?? 0;
  }

  /** Number of characters the record occupies in its source, including the mark. */
  get stringLength(): number {
    return 2 * this.bytes.length + 1;
  }

  /** Base address set by a type `02` record (payload × 16). */
  get extendedSegmentAddress(): number {
    return this.read16('extendedSegmentAddress', 4) * 16;
  }

  /** Base address set by a type `04` record (payload << 16). */
  get extendedLinearAddress(): number {
    return this.read16('extendedLinearAddress', 4) * 0x10000;
  }

  get startSegmentAddress(): StartSegmentAddress {
    return {
      codeSegment: this.read16('startSegmentAddress', 4),
      instructionPointer: this.read16('startSegmentAddress', 6),
    };
  }

  get startLinearAddress(): number {
    return this.read16('startLinearAddress', 4) * 0x10000 + this.read16('startLinearAddress', 6);
  }

  /**
   * Re-check the checksum and the length byte.
   */
  validate(): void {
    if (this.bytes.length < 5) {
      throw new HexValueError(
        `A record needs at least 5 bytes, got ${this.bytes.length}`,
        DiagnosticIds.TruncatedRecord,
      );
    }
    if (!isValidChecksum(this.bytes)) {
      throw new HexValueError('Checksum is not valid!', DiagnosticIds.BadChecksum);
    }
    const declared = this.bytes[0] ?? 0;
    if (declared !== this.bytes.length - 5) {
      throw new HexValueError(
        `Length byte is not valid! Expected: ${declared} Got: ${this.bytes.length - 5}`,
        DiagnosticIds.BadLength,
      );
    }
  }

  /**
   * Re-encode the record as one line with the given start code.
   */
  line(startCode = ':'): string {
    return recordBytesToLine(this.bytes, startCode);
  }

  private read16(type: RecordType, offset: number): number {
    const size = type === 'extendedSegmentAddress' || type === 'extendedLinearAddress' ? 7 : 9;
    if (this.recordType !== type || this.bytes.length !== size) {
      throw new HexValueError(
        `Record ${this.recordType} with ${this.bytes.length} bytes does not contain a ${type} (required ${size} bytes)`,
        DiagnosticIds.RecordAccessMismatch,
      );
    }
    return ((this.bytes[offset] ?? 0) << 8) | (this.bytes[offset + 1] ?? 0);
  }
}

/**
 * Decode the record whose mark sits at `source[offset]`.
 *
 * Reads exactly `2 * byteCount + 11` characters; anything after the checksum is left to the caller.
 */
export function parseRecord(source: string, offset: number, startCode = ':'): HexRecord {
  const mark = startCodePoint(startCode);
  if (source.length < offset + MIN_RECORD_CHARS) {
    throw new HexValueError(
      `Line is too short! The shortest possible record is ${MIN_RECORD_CHARS} characters - got ${Math.max(0, source.length - offset)}`,
      DiagnosticIds.TruncatedRecord,
    );
  }
  if (source.charCodeAt(offset) !== mark) {
    throw new HexValueError(
      `Record does not start with RECORD MARK '${startCode}' - found '${source.charAt(offset)}'`,
      DiagnosticIds.MissingStartCode,
    );
  }

  const byteCount = readHexByte(source, offset + 1);
  const expectedChars = 2 * byteCount + MIN_RECORD_CHARS;
  if (source.length < offset + expectedChars) {
    throw new HexValueError(
      `Line is too short! Expected ${expectedChars} characters - got ${source.length - offset}`,
      DiagnosticIds.TruncatedRecord,
    );
  }

  const bytes = new Uint8Array(byteCount + 5);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = readHexByte(source, offset + 1 + 2 * i);
  }
  return new HexRecord(bytes);
}

/**
 * Decode a single line. Characters before the first record mark are ignored.
 */
export function parseRecordLine(line: string, startCode = ':'): HexRecord {
  startCodePoint(startCode);
  const start = line.indexOf(startCode);
  if (start === -1) {
    throw new HexValueError(
      `Line contains no RECORD MARK '${startCode}' - failed to find start of record!`,
      DiagnosticIds.MissingStartCode,
    );
  }
  return parseRecord(line, start, startCode);
}
