import { DiagnosticIds } from '../diagnostics/types.js';
import { HexRangeError } from '../diagnostics/errors.js';
import { validateAddressAndLength } from './validation.js';

/**
 * Byte order for the typed append helpers.
 */
export type Endian = 'little' | 'big';

/**
 * One byte of a segment together with its absolute address.
 */
export interface SegmentByte {
  address: number;
  value: number;
}

const MIN_CAPACITY = 16;

/**
 * A contiguous block of bytes anchored at an absolute start address.
 *
 * The backing buffer grows geometrically; `length`, `bytes` and every address-based accessor only
 * ever see the first `length` bytes.
 */
export class MemorySegment implements Iterable<SegmentByte> {
  private startAddress: number;
  private data: Uint8Array;
  private size: number;

  constructor(opts: { address: number; length?: number }) {
    const length = opts.length ?? 0;
    validateAddressAndLength(opts.address, length);
    this.startAddress = opts.address;
    this.data = new Uint8Array(length);
    this.size = length;
  }

  /**
   * Create a segment holding a copy of `data` (values are truncated to 0..255).
   */
  static fromBytes(opts: { address: number; data: ArrayLike<number> }): MemorySegment {
    validateAddressAndLength(opts.address, opts.data.length);
    const seg = new MemorySegment({ address: opts.address });
    seg.appendAll(opts.data);
    return seg;
  }

  /** First valid address. */
  get address(): number {
    return this.startAddress;
  }

  /** One past the last valid address. */
  get endAddress(): number {
    return this.startAddress + this.size;
  }

  get length(): number {
    return this.size;
  }

  /** Live view of the segment contents; invalidated by any operation that grows the segment. */
  get bytes(): Uint8Array {
    return this.data.subarray(0, this.size);
  }

  /**
   * Live `DataView` over the segment contents, for reading typed values; invalidated by any
   * operation that grows the segment.
   */
  get dataView(): DataView {
    return new DataView(this.data.buffer, this.data.byteOffset, this.size);
  }

  /**
   * True when `size` bytes starting at absolute address `position` lie inside this segment.
   */
  isInRange(position: number, size: number): boolean {
    return this.startAddress <= position && position + size <= this.endAddress;
  }

  /**
   * True when the two segments overlap or touch, i.e. they can be combined without a gap.
   */
  overlaps(other: MemorySegment): boolean {
    return this.address <= other.endAddress && other.address <= this.endAddress;
  }

  byte(position: number): number {
    if (!this.isInRange(position, 1)) {
      throw this.outOfRange(position);
    }
    return this.data[position - this.startAddress] ?? 0;
  }

  /**
   * Overwrite a byte that already exists in the segment. Does not grow the segment.
   */
  writeByte(position: number, value: number): void {
    if (!this.isInRange(position, 1)) {
      throw this.outOfRange(position);
    }
    this.data[position - this.startAddress] = value;
  }

  fill(value: number): void {
    this.data.fill(value, 0, this.size);
  }

  /**
   * Re-anchor the segment at `newAddress` with `newLength` bytes.
   *
   * Bytes keep their absolute addresses where the old and new ranges overlap; the rest is zero.
   */
  resize(newAddress: number, newLength: number): void {
    validateAddressAndLength(newAddress, newLength);
    if (newAddress === this.startAddress) {
      this.reserve(newLength);
      if (newLength > this.size) {
        this.data.fill(0, this.size, newLength);
      }
      this.size = newLength;
      return;
    }

    const next = new Uint8Array(Math.max(newLength, MIN_CAPACITY));
    const writeOffset = newAddress < this.startAddress ? this.startAddress - newAddress : 0;
    const readOffset = newAddress > this.startAddress ? newAddress - this.startAddress : 0;
    const copyLength = Math.min(this.size - readOffset, newLength - writeOffset);
    if (copyLength > 0) {
      next.set(this.data.subarray(readOffset, readOffset + copyLength), writeOffset);
    }
    this.startAddress = newAddress;
    this.data = next;
    this.size = newLength;
  }

  append(value: number): void {
    const old = this.size;
    this.resize(this.startAddress, old + 1);
    this.data[old] = value;
  }

  appendAll(values: ArrayLike<number>): void {
    const old = this.size;
    this.resize(this.startAddress, old + values.length);
    this.data.set(values, old);
  }

  appendInt8(value: number): void {
    this.grow(1).setInt8(0, value);
  }

  appendUint8(value: number): void {
    this.grow(1).setUint8(0, value);
  }

  appendInt16(value: number, endian: Endian = 'little'): void {
    this.grow(2).setInt16(0, value, endian === 'little');
  }

  appendUint16(value: number, endian: Endian = 'little'): void {
    this.grow(2).setUint16(0, value, endian === 'little');
  }

  appendInt32(value: number, endian: Endian = 'little'): void {
    this.grow(4).setInt32(0, value, endian === 'little');
  }

  appendUint32(value: number, endian: Endian = 'little'): void {
    this.grow(4).setUint32(0, value, endian === 'little');
  }

  appendInt64(value: bigint, endian: Endian = 'little'): void {
    this.grow(8).setBigInt64(0, value, endian === 'little');
  }

  appendUint64(value: bigint, endian: Endian = 'little'): void {
    this.grow(8).setBigUint64(0, value, endian === 'little');
  }

  appendFloat32(value: number, endian: Endian = 'little'): void {
    this.grow(4).setFloat32(0, value, endian === 'little');
  }

  appendFloat64(value: number, endian: Endian = 'little'): void {
    this.grow(8).setFloat64(0, value, endian === 'little');
  }

  /**
   * Copy of the bytes between the relative offsets `start` and `end`.
   */
  slice(start: number, end?: number): Uint8Array {
    return this.bytes.slice(start, end);
  }

  /**
   * Grow to the union of both ranges, then copy every byte of `other` on top.
   */
  combine(other: MemorySegment): void {
    if (other === this) return;
    const nextAddress = Math.min(this.address, other.address);
    const nextEnd = Math.max(this.endAddress, other.endAddress);
    this.resize(nextAddress, nextEnd - nextAddress);
    this.data.set(other.bytes, other.address - this.startAddress);
  }

  *[Symbol.iterator](): Iterator<SegmentByte> {
    for (let i = 0; i < this.size; i++) {
      yield { address: this.startAddress + i, value: this.data[i] ?? 0 };
    }
  }

  private reserve(capacity: number): void {
    if (capacity <= this.data.length) return;
    const next = new Uint8Array(Math.max(capacity, this.data.length * 2, MIN_CAPACITY));
    next.set(this.data.subarray(0, this.size));
    this.data = next;
  }

  /** Append `width` zero bytes and return a view over them. */
  private grow(width: number): DataView {
    const old = this.size;
    this.resize(this.startAddress, old + width);
    return new DataView(this.data.buffer, this.data.byteOffset + old, width);
  }

  private outOfRange(position: number): HexRangeError {
    return new HexRangeError(
      `Address ${position} is out of range [${this.startAddress}, ${this.endAddress}[`,
      DiagnosticIds.OutOfSegment,
    );
  }
}
