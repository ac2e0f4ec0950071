import { describe, expect, it } from 'vitest';

import { HexRangeError, HexValueError } from '../src/diagnostics/errors.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { segmentToI16Records, writeHex } from '../src/formats/writeHex.js';
import { MemorySegmentContainer } from '../src/memory/container.js';
import { MemorySegment } from '../src/memory/segment.js';
import { hexErrorId } from './test-helpers.js';

function dataRecords(text: string): string[] {
  return text.split('\n').filter((line) => line.slice(7, 9) === '00');
}

describe('writeHex', () => {
  it('writes data records and the end-of-file record', () => {
    const container = MemorySegmentContainer.fromData([1, 2, 3]);
    expect(writeHex({ container }, { format: 'i8HEX' }).text).toBe(
      ':03000000010203F7\n:00000001FF\n',
    );
  });

  it('writes only the end-of-file record for an empty image', () => {
    expect(writeHex({ container: new MemorySegmentContainer() }).text).toBe(':00000001FF\n');
  });

  it('splits segments into records of at most lineLength bytes', () => {
    const cases: Array<[number, number, number]> = [
      [40, 16, 3],
      [255, 255, 1],
      [256, 255, 2],
      [10, 1, 10],
    ];
    for (const [length, lineLength, records] of cases) {
      const container = MemorySegmentContainer.fromData(new Uint8Array(length), 0x100);
      const text = writeHex({ container }, { format: 'i8HEX', lineLength }).text;
      expect(dataRecords(text)).toHaveLength(records);
    }
  });

  it('addresses each record at its first byte', () => {
    const container = MemorySegmentContainer.fromData(new Uint8Array(40), 0x100);
    const lines = dataRecords(writeHex({ container }, { format: 'i8HEX' }).text);
    expect(lines.map((line) => line.slice(1, 7))).toEqual(['100100', '100110', '080120']);
  });

  it('accepts i8HEX segments ending at 65535 and rejects larger ones', () => {
    const fits = MemorySegmentContainer.fromData([0xaa], 0xfffe);
    expect(writeHex({ container: fits }, { format: 'i8HEX' }).text).toBe(
      ':01FFFE00AA58\n:00000001FF\n',
    );
    const tooHigh = MemorySegmentContainer.fromData([0xaa, 0xbb], 0xfffe);
    expect(hexErrorId(() => writeHex({ container: tooHigh }, { format: 'i8HEX' }))).toBe(
      DiagnosticIds.FormatRangeExceeded,
    );
  });

  it('emits extended segment address records when the block changes', () => {
    const container = MemorySegmentContainer.fromData(new Uint8Array(16), 0x1fff8);
    expect(writeHex({ container }, { format: 'i16HEX', lineLength: 8 }).text).toBe(
      [
        ':020000021000EC',
        ':08FFF800000000000000000001',
        ':020000022000DC',
        ':080000000000000000000000F8',
        ':00000001FF',
        '',
      ].join('\n'),
    );
  });

  it('rejects i16HEX segments ending above 1048560', () => {
    const out: string[] = [];
    const fits = new MemorySegment({ address: 0xfffef, length: 1 });
    segmentToI16Records(out, fits, ':', 16);
    expect(out).toHaveLength(2);
    const tooHigh = new MemorySegment({ address: 0xffff0, length: 1 });
    expect(() => segmentToI16Records(out, tooHigh, ':', 16)).toThrow(HexRangeError);
  });

  it('emits extended linear address records when the upper 16 bits change', () => {
    const container = MemorySegmentContainer.fromData([0xde, 0xad, 0xbe, 0xef], 0x08000000);
    expect(writeHex({ container }).text).toBe(
      ':020000040800F2\n:04000000DEADBEEFC4\n:00000001FF\n',
    );
  });

  it('writes start address records before the data', () => {
    const container = MemorySegmentContainer.fromData([1, 2, 3]);
    const text = writeHex({
      container,
      startLinearAddress: 0xcd,
      startSegmentAddress: { codeSegment: 0, instructionPointer: 0x3800 },
    }).text;
    expect(text).toBe(
      ':04000005000000CD2A\n:0400000300003800C1\n:03000000010203F7\n:00000001FF\n',
    );
  });

  it('uses the start code on every record', () => {
    const container = MemorySegmentContainer.fromData([1, 2, 3]);
    expect(writeHex({ container }, { format: 'i8HEX', startCode: '@' }).text).toBe(
      '@03000000010203F7\n@00000001FF\n',
    );
  });

  it('rejects overlapping segments unless duplicates are allowed', () => {
    const container = new MemorySegmentContainer();
    container.addAll(0x00, new Uint8Array(0x10));
    container.addAll(0x20, new Uint8Array(0x10));
    container.segments[0]!.resize(0x00, 0x21);
    expect(() => writeHex({ container })).toThrow('There are overlapping Segments in the file!');
    expect(hexErrorId(() => writeHex({ container }))).toBe(DiagnosticIds.OverlappingSegments);
    expect(dataRecords(writeHex({ container }, { allowDuplicateAddresses: true }).text)).toHaveLength(
      4,
    );
  });

  it('rejects line lengths outside 1..255', () => {
    const container = MemorySegmentContainer.fromData([1]);
    for (const lineLength of [0, 256, 1.5]) {
      expect(hexErrorId(() => writeHex({ container }, { lineLength }))).toBe(
        DiagnosticIds.InvalidLineLength,
      );
    }
  });

  it('rejects a start code that is not one character', () => {
    const container = MemorySegmentContainer.fromData([1, 2, 3]);
    for (const startCode of ['', '::']) {
      expect(() => writeHex({ container }, { startCode })).toThrow(HexValueError);
      expect(hexErrorId(() => writeHex({ container }, { startCode }))).toBe(
        DiagnosticIds.InvalidStartCode,
      );
    }
  });
});
