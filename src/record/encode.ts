import { HexRangeError } from '../diagnostics/errors.js';
import { appendChecksum } from './checksum.js';
import { RecordTypeCodes } from './types.js';

const HEX_BYTES: readonly string[] = Array.from({ length: 256 }, (_, n) =>
  n.toString(16).toUpperCase().padStart(2, '0'),
);

export function toHexByte(n: number): string {
  return HEX_BYTES[n & 0xff] ?? '00';
}

/**
 * Render raw record bytes (header, payload and checksum) as one line.
 */
export function recordBytesToLine(bytes: ArrayLike<number>, startCode = ':'): string {
  let line = startCode;
  for (let i = 0; i < bytes.length; i++) {
    line += toHexByte(bytes[i] ?? 0);
  }
  return `${line}\n`;
}

function addressRecord(type: number, hi: number, lo: number, startCode: string): string {
  const raw = [0x02, 0x00, 0x00, type, hi & 0xff, lo & 0xff];
  return recordBytesToLine(appendChecksum(raw), startCode);
}

/**
 * Create a data record (type `00`) for up to 255 bytes at a 16-bit record address.
 *
 * Example: `createDataRecord(0x0030, [0x02, 0x33, 0x7a])` → `":0300300002337A1E\n"`.
 */
export function createDataRecord(
  address: number,
  data: ArrayLike<number>,
  startCode = ':',
): string {
  if (address < 0 || address > 0xffff) {
    throw new HexRangeError(`Address ${address} does not fit in two bytes!`);
  }
  const byteCount = data.length;
  if (byteCount > 255) {
    throw new HexRangeError(
      `A maximum of 255 bytes of data can be in one data record! Got ${byteCount}`,
    );
  }
  const raw = new Uint8Array(byteCount + 4);
  raw[0] = byteCount;
  raw[1] = (address >> 8) & 0xff;
  raw[2] = address & 0xff;
  raw[3] = RecordTypeCodes.data;
  raw.set(data, 4);
  return recordBytesToLine(appendChecksum(raw), startCode);
}

/**
 * Create an extended segment address record (type `02`).
 *
 * `address` is the absolute base; the record stores `address >> 4`, which must fit 16 bits.
 */
export function createExtendedSegmentAddressRecord(address: number, startCode = ':'): string {
  const paragraph = Math.floor(address / 16);
  if (paragraph > 0xffff) {
    throw new HexRangeError(`Address ${address} does not fit in two bytes!`);
  }
  return addressRecord(
    RecordTypeCodes.extendedSegmentAddress,
    paragraph >> 8,
    paragraph,
    startCode,
  );
}

/**
 * Create an extended linear address record (type `04`) holding the upper 16 bits of `address`.
 *
 * Bits above 32 are dropped without a range check.
 */
export function createExtendedLinearAddressRecord(address: number, startCode = ':'): string {
  const upper = (address >>> 16) & 0xffff;
  return addressRecord(RecordTypeCodes.extendedLinearAddress, upper >> 8, upper, startCode);
}

/**
 * Create a start segment address record (type `03`) from a CS:IP pair.
 */
export function createStartSegmentAddressRecord(
  codeSegment: number,
  instructionPointer: number,
  startCode = ':',
): string {
  const raw = [
    0x04,
    0x00,
    0x00,
    RecordTypeCodes.startSegmentAddress,
    (codeSegment >> 8) & 0xff,
    codeSegment & 0xff,
    (instructionPointer >> 8) & 0xff,
    instructionPointer & 0xff,
  ];
  return recordBytesToLine(appendChecksum(raw), startCode);
}

/**
 * Create a start linear address record (type `05`): 32-bit entry point, big-endian.
 */
export function createStartLinearAddressRecord(address: number, startCode = ':'): string {
  const raw = [
    0x04,
    0x00,
    0x00,
    RecordTypeCodes.startLinearAddress,
    (address >>> 24) & 0xff,
    (address >>> 16) & 0xff,
    (address >>> 8) & 0xff,
    address & 0xff,
  ];
  return recordBytesToLine(appendChecksum(raw), startCode);
}

/**
 * The end-of-file record. Exactly one per file.
 */
export function createEndOfFileRecord(startCode = ':'): string {
  return `${startCode}00000001FF\n`;
}
