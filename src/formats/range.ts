import type { MemorySegmentContainer } from '../memory/container.js';

/**
 * Half-open address range.
 */
export interface AddressRange {
  /** Inclusive start address. */
  start: number;
  /** Exclusive end address. */
  end: number;
}

/**
 * Ranges covered by the segments of a container, ascending.
 *
 * - Ranges are half-open `[start, end)`.
 * - For an empty container, `[]` is returned.
 */
export function getSegmentRanges(container: MemorySegmentContainer): AddressRange[] {
  return [...container.segments]
    .sort((a, b) => a.address - b.address)
    .map((seg) => ({ start: seg.address, end: seg.endAddress }));
}

/**
 * Smallest range covering every segment. For an empty container, `{ start: 0, end: 0 }`.
 */
export function getImageRange(container: MemorySegmentContainer): AddressRange {
  const ranges = getSegmentRanges(container);
  if (ranges.length === 0) return { start: 0, end: 0 };
  return {
    start: ranges[0]!.start,
    end: ranges.reduce((end, r) => Math.max(end, r.end), 0),
  };
}
