import { DiagnosticIds } from '../diagnostics/types.js';
import { HexRangeError } from '../diagnostics/errors.js';
import { MemorySegmentContainer } from './container.js';
import { MemorySegment } from './segment.js';

interface Placeholder {
  address: number;
  end: number;
}

/**
 * Collects segments without merging them, then merges everything in one pass on {@link build}.
 *
 * Adding many small segments to a {@link MemorySegmentContainer} one by one reallocates on every
 * insert; the builder first works out the final ranges and allocates each of them once.
 */
export class MemorySegmentContainerBuilder {
  private readonly pending: MemorySegment[] = [];

  add(segment: MemorySegment): void {
    this.pending.push(segment);
  }

  /**
   * Merge all added segments into a new container.
   *
   * Unless `allowDuplicateAddresses` is set, segments that share an address raise a
   * {@link HexRangeError}. When it is set, the segment with the higher start address wins, and
   * among segments with the same start address the one added last wins.
   */
  build(allowDuplicateAddresses = false): MemorySegmentContainer {
    this.pending.sort((a, b) => a.address - b.address);
    const container = new MemorySegmentContainer();
    for (const range of this.placeholders(allowDuplicateAddresses)) {
      container.addSegment(
        new MemorySegment({ address: range.address, length: range.end - range.address }),
      );
    }
    for (const seg of this.pending) {
      container.addSegment(seg);
    }
    return container;
  }

  /**
   * Final address ranges, ascending.
   *
   * Input is sorted by start address, so a segment can only touch the most recently opened
   * placeholder: every earlier one ended before that placeholder began.
   */
  private placeholders(allowDuplicateAddresses: boolean): Placeholder[] {
    const ranges: Placeholder[] = [];
    for (const seg of this.pending) {
      const last = ranges[ranges.length - 1];
      if (!last || seg.address > last.end) {
        ranges.push({ address: seg.address, end: seg.endAddress });
        continue;
      }
      const joinsExactly = last.end === seg.address || seg.endAddress === last.address;
      if (!joinsExactly && !allowDuplicateAddresses) {
        throw new HexRangeError(
          `The address range [${seg.address}, ${seg.endAddress}[ of a record is not unique!`,
          DiagnosticIds.OverlappingSegments,
        );
      }
      last.end = Math.max(last.end, seg.endAddress);
    }
    return ranges;
  }
}
