import { describe, expect, it } from 'vitest';

import { MemorySegmentContainer } from '../src/memory/container.js';
import { MemorySegment } from '../src/memory/segment.js';

function layout(container: MemorySegmentContainer): Array<{ address: number; bytes: number[] }> {
  return container.segments.map((seg) => ({ address: seg.address, bytes: [...seg.bytes] }));
}

describe('MemorySegmentContainer', () => {
  it('starts empty', () => {
    const container = new MemorySegmentContainer();
    expect(container.segments).toHaveLength(0);
    expect(container.maxAddress).toBe(0);
    expect(container.toString()).toBe('"segments": []');
  });

  it('creates one zeroed segment from an address and a length', () => {
    const container = new MemorySegmentContainer({ address: 0x10, length: 2 });
    expect(layout(container)).toEqual([{ address: 0x10, bytes: [0, 0] }]);
    expect(new MemorySegmentContainer({ address: -1, length: 2 }).segments).toHaveLength(0);
    expect(new MemorySegmentContainer({ address: 0x10 }).segments).toHaveLength(0);
  });

  it('creates a container from data', () => {
    const container = MemorySegmentContainer.fromData([1, 2, 3], 0x10);
    expect(layout(container)).toEqual([{ address: 0x10, bytes: [1, 2, 3] }]);
    expect(container.maxAddress).toBe(0x13);
  });

  it('keeps disjoint segments sorted', () => {
    const container = new MemorySegmentContainer();
    container.addAll(0x20, [1]);
    container.addAll(0x00, [2, 3]);
    expect(layout(container)).toEqual([
      { address: 0x00, bytes: [2, 3] },
      { address: 0x20, bytes: [1] },
    ]);
    expect(container.maxAddress).toBe(0x21);
  });

  it('merges touching segments', () => {
    const container = new MemorySegmentContainer();
    container.addAll(0, [1, 2]);
    container.addAll(2, [3, 4]);
    expect(layout(container)).toEqual([{ address: 0, bytes: [1, 2, 3, 4] }]);
  });

  it('overwrites existing data with newly added data', () => {
    const container = new MemorySegmentContainer();
    container.addAll(0, [1, 2, 3, 4]);
    container.addAll(2, [9, 9, 9]);
    expect(layout(container)).toEqual([{ address: 0, bytes: [1, 2, 9, 9, 9] }]);
  });

  it('merges a segment that bridges two others', () => {
    const container = new MemorySegmentContainer();
    container.addAll(0, [1, 1]);
    container.addAll(4, [2, 2]);
    expect(container.segments).toHaveLength(2);
    container.addAll(2, [3, 3]);
    expect(layout(container)).toEqual([{ address: 0, bytes: [1, 1, 3, 3, 2, 2] }]);
  });

  it('keeps the newest data when a segment overlaps two others', () => {
    const container = new MemorySegmentContainer();
    container.addAll(0, [1, 1, 1, 1]);
    container.addAll(6, [2, 2, 2, 2]);
    container.addAll(2, [9, 9, 9, 9, 9, 9]);
    expect(layout(container)).toEqual([{ address: 0, bytes: [1, 1, 9, 9, 9, 9, 9, 9, 2, 2] }]);
    expect(container.validateSegmentsAreUnique()).toBe(true);
  });

  it('detects segments that share addresses', () => {
    const container = new MemorySegmentContainer();
    container.addAll(0x00, new Uint8Array(0x10));
    container.addAll(0x20, new Uint8Array(0x10));
    expect(container.validateSegmentsAreUnique()).toBe(true);

    container.segments[0]!.resize(0x00, 0x20);
    expect(container.validateSegmentsAreUnique()).toBe(true);

    container.segments[0]!.resize(0x00, 0x21);
    expect(container.validateSegmentsAreUnique()).toBe(false);
  });

  it('reports whether a segment is new', () => {
    const container = MemorySegmentContainer.fromData(new Uint8Array(0x10), 0x10);
    expect(container.segmentIsNew(new MemorySegment({ address: 0x30, length: 0x10 }))).toBe(true);
    expect(container.segmentIsNew(new MemorySegment({ address: 0x18, length: 0x10 }))).toBe(false);
    expect(container.segmentIsNew(new MemorySegment({ address: 0x00, length: 0x10 }))).toBe(false);
  });

  it('describes its segments as JSON', () => {
    const container = new MemorySegmentContainer();
    container.addAll(0, [1, 2]);
    container.addAll(16, [3]);
    expect(container.toString()).toBe('"segments": [{"start": 0,"end": 2},{"start": 16,"end": 17}]');
  });
});
