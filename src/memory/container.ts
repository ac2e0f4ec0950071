import { MemorySegment } from './segment.js';

/**
 * An ordered set of non-overlapping {@link MemorySegment}s.
 *
 * Segments that overlap or touch are combined as they are added, so after every `addSegment` the
 * list is sorted by start address and gap-separated.
 */
export class MemorySegmentContainer {
  private readonly segmentList: MemorySegment[] = [];

  /**
   * Create a container with one zero-filled segment when both `address` and `length` are given
   * and non-negative; otherwise the container is empty.
   */
  constructor(opts: { address?: number; length?: number } = {}) {
    const { address, length } = opts;
    if (address !== undefined && length !== undefined && address >= 0 && length >= 0) {
      this.addSegment(new MemorySegment({ address, length }));
    }
  }

  /**
   * Create a container with a single segment holding `data` at `address`.
   */
  static fromData(data: ArrayLike<number>, address = 0): MemorySegmentContainer {
    const container = new MemorySegmentContainer();
    container.addAll(address, data);
    return container;
  }

  /** All segments, ascending by start address. Use {@link addSegment} or {@link addAll} to add data. */
  get segments(): readonly MemorySegment[] {
    return this.segmentList;
  }

  /** Greatest segment end address, or 0 for an empty container. */
  get maxAddress(): number {
    return this.segmentList.reduce((max, seg) => Math.max(max, seg.endAddress), 0);
  }

  /**
   * Store `data` at `startAddress`, overwriting anything already stored there.
   */
  addAll(startAddress: number, data: ArrayLike<number>): void {
    this.addSegment(MemorySegment.fromBytes({ address: startAddress, data }));
  }

  /**
   * Add `segment`, overwriting data previously stored at the same addresses, then sort and merge.
   */
  addSegment(segment: MemorySegment): void {
    const target = this.segmentList.find((old) => old.overlaps(segment));
    if (target) {
      target.combine(segment);
    } else {
      this.segmentList.push(segment);
    }
    this.sortSegments();
    this.mergeSegments();
  }

  /**
   * Combine every pair of overlapping or touching segments.
   *
   * Where addresses are duplicated, the segment starting at the lower address keeps its values.
   */
  mergeSegments(): void {
    const merged = new Array<boolean>(this.segmentList.length).fill(false);
    for (let i = 0; i < this.segmentList.length; i++) {
      const lower = this.segmentList[i]!;
      for (let k = i + 1; k < this.segmentList.length; k++) {
        const upper = this.segmentList[k]!;
        if (upper.overlaps(lower)) {
          upper.combine(lower);
          merged[i] = true;
        }
      }
    }
    if (!merged.includes(true)) return;
    const kept = this.segmentList.filter((_, i) => !merged[i]);
    this.segmentList.splice(0, this.segmentList.length, ...kept);
  }

  /**
   * Sort ascending by start address. The sort is stable.
   */
  sortSegments(): void {
    this.segmentList.sort((a, b) => a.address - b.address);
  }

  /**
   * True when no two segments share an address (half-open ranges, so touching segments pass).
   */
  validateSegmentsAreUnique(): boolean {
    for (let i = 0; i < this.segmentList.length; i++) {
      const a = this.segmentList[i]!;
      for (let k = i + 1; k < this.segmentList.length; k++) {
        const b = this.segmentList[k]!;
        if (a.address < b.endAddress && b.address < a.endAddress) {
          return false;
        }
      }
    }
    return true;
  }

  /**
   * True when neither the first address nor the end address of `next` falls inside a stored segment.
   */
  segmentIsNew(next: MemorySegment): boolean {
    return this.segmentList.every(
      (old) => !old.isInRange(next.address, 1) && !old.isInRange(next.endAddress, 1),
    );
  }

  /**
   * Segment ranges as a JSON fragment: `"segments": [{"start": 0,"end": 16}]`.
   */
  toString(): string {
    const ranges = this.segmentList.map((seg) => `{"start": ${seg.address},"end": ${seg.endAddress}}`);
    return `"segments": [${ranges.join(',')}]`;
  }
}
