import { DiagnosticIds } from '../diagnostics/types.js';
import { HexRangeError, HexValueError } from '../diagnostics/errors.js';
import type { MemorySegment } from '../memory/segment.js';
import { validateAddressAndLength } from '../memory/validation.js';
import {
  createDataRecord,
  createEndOfFileRecord,
  createExtendedLinearAddressRecord,
  createExtendedSegmentAddressRecord,
  createStartLinearAddressRecord,
  createStartSegmentAddressRecord,
} from '../record/encode.js';
import { assertNever } from '../record/types.js';
import type { HexArtifact, HexImage, IntelHexFormat, WriteHexOptions } from './types.js';

/** Highest end address an `i8HEX` segment may have. */
export const I8HEX_MAX_ADDRESS = 0xffff;
/** Highest end address an `i16HEX` segment may have. */
export const I16HEX_MAX_ADDRESS = 0xffff * 16;

/**
 * Bytes per data record must be within 1..255.
 */
export function validateLineLength(lineLength: number): void {
  if (!Number.isInteger(lineLength) || lineLength > 255 || lineLength < 1) {
    throw new HexValueError(
      `Lines must hold between 1 and 255 bytes! Got ${lineLength}`,
      DiagnosticIds.InvalidLineLength,
    );
  }
}

/**
 * The record mark must be exactly one character.
 */
export function validateStartCode(startCode: string): void {
  if (startCode.length !== 1) {
    throw new HexValueError(
      `The startToken string can only be 1 character long, got ${startCode.length} - string: '${startCode}'`,
      DiagnosticIds.InvalidStartCode,
    );
  }
}

function chunk(seg: MemorySegment, offset: number, lineLength: number): Uint8Array {
  return seg.bytes.subarray(offset, Math.min(offset + lineLength, seg.length));
}

/**
 * Data records only; the segment must end at or below 65535.
 */
export function segmentToI8Records(
  out: string[],
  seg: MemorySegment,
  startCode: string,
  lineLength: number,
): void {
  validateLineLength(lineLength);
  if (seg.endAddress > I8HEX_MAX_ADDRESS) {
    throw new HexRangeError(
      `Address range [${seg.address},${seg.endAddress}] can not be represented as I8HEX (max. Range: [0,${I8HEX_MAX_ADDRESS}])`,
      DiagnosticIds.FormatRangeExceeded,
    );
  }
  for (let i = 0; i < seg.length; i += lineLength) {
    out.push(createDataRecord(seg.address + i, chunk(seg, i, lineLength), startCode));
  }
}

/**
 * Data records preceded by an extended segment address record whenever the 64 KiB block changes.
 */
export function segmentToI16Records(
  out: string[],
  seg: MemorySegment,
  startCode: string,
  lineLength: number,
): void {
  validateLineLength(lineLength);
  if (seg.endAddress > I16HEX_MAX_ADDRESS) {
    throw new HexRangeError(
      `Address range [${seg.address},${seg.endAddress}] can not be represented as I16HEX (max. Range: [0,${I16HEX_MAX_ADDRESS}])`,
      DiagnosticIds.FormatRangeExceeded,
    );
  }
  let lastBlock = 0;
  for (let i = 0; i < seg.length; i += lineLength) {
    const address = seg.address + i;
    const block = address & 0xf0000;
    if (block !== lastBlock) {
      out.push(createExtendedSegmentAddressRecord(block, startCode));
    }
    lastBlock = block;
    out.push(createDataRecord(address & 0xffff, chunk(seg, i, lineLength), startCode));
  }
}

/**
 * Data records preceded by an extended linear address record whenever the upper 16 bits change.
 */
export function segmentToI32Records(
  out: string[],
  seg: MemorySegment,
  startCode: string,
  lineLength: number,
): void {
  validateLineLength(lineLength);
  validateAddressAndLength(seg.address, seg.length);
  let lastBlock = 0;
  for (let i = 0; i < seg.length; i += lineLength) {
    const address = seg.address + i;
    const block = Math.floor(address / 0x10000) * 0x10000;
    if (block !== lastBlock) {
      out.push(createExtendedLinearAddressRecord(block, startCode));
    }
    lastBlock = block;
    out.push(createDataRecord(address % 0x10000, chunk(seg, i, lineLength), startCode));
  }
}

/**
 * Append the records of one segment in the given format.
 */
export function segmentToRecords(
  out: string[],
  seg: MemorySegment,
  format: IntelHexFormat,
  startCode: string,
  lineLength: number,
): void {
  switch (format) {
    case 'i8HEX':
      segmentToI8Records(out, seg, startCode, lineLength);
      return;
    case 'i16HEX':
      segmentToI16Records(out, seg, startCode, lineLength);
      return;
    case 'i32HEX':
      segmentToI32Records(out, seg, startCode, lineLength);
      return;
    default:
      assertNever(format, 'HEX format');
  }
}

/**
 * Create an Intel HEX artifact from a memory image.
 *
 * Start address records come first, then the segments in ascending order, then the end-of-file
 * record. Segments are sorted in place.
 */
export function writeHex(image: HexImage, opts?: WriteHexOptions): HexArtifact {
  const format = opts?.format ?? 'i32HEX';
  const lineLength = opts?.lineLength ?? 16;
  const startCode = opts?.startCode ?? ':';
  validateLineLength(lineLength);
  validateStartCode(startCode);

  const { container } = image;
  container.sortSegments();
  if (!opts?.allowDuplicateAddresses && !container.validateSegmentsAreUnique()) {
    throw new HexRangeError(
      'There are overlapping Segments in the file!',
      DiagnosticIds.OverlappingSegments,
    );
  }

  const lines: string[] = [];
  if (image.startLinearAddress !== undefined) {
    lines.push(createStartLinearAddressRecord(image.startLinearAddress, startCode));
  }
  if (image.startSegmentAddress !== undefined) {
    const { codeSegment, instructionPointer } = image.startSegmentAddress;
    lines.push(createStartSegmentAddressRecord(codeSegment, instructionPointer, startCode));
  }
  for (const seg of container.segments) {
    segmentToRecords(lines, seg, format, startCode, lineLength);
  }
  lines.push(createEndOfFileRecord(startCode));
  return { kind: 'hex', text: lines.join('') };
}
