import { describe, expect, it } from 'vitest';

import { HexRangeError } from '../src/diagnostics/errors.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { IntelHexFormat } from '../src/formats/types.js';
import { IntelHexFile } from '../src/intelHexFile.js';
import type { MemorySegmentContainer } from '../src/memory/container.js';
import { hexErrorId, pseudoRandomBytes } from './test-helpers.js';

function layout(container: MemorySegmentContainer): Array<{ address: number; bytes: number[] }> {
  return container.segments.map((seg) => ({ address: seg.address, bytes: [...seg.bytes] }));
}

function expectRoundTrip(file: IntelHexFile, format: IntelHexFormat): void {
  const text = file.toFileContents({ format });
  for (const source of [text, text.toLowerCase()]) {
    const back = IntelHexFile.fromString(source);
    expect(layout(back)).toEqual(layout(file));
    expect(back.startSegmentAddress).toEqual(file.startSegmentAddress);
    expect(back.startLinearAddress).toBe(file.startLinearAddress);
  }
}

describe('IntelHexFile', () => {
  it('round-trips an i8HEX image', () => {
    const file = new IntelHexFile();
    file.addAll(0x0000, pseudoRandomBytes(100, 1));
    file.addAll(0x2000, pseudoRandomBytes(37, 2));
    expect(file.format).toBe('i8HEX');
    expectRoundTrip(file, 'i8HEX');
  });

  it('round-trips an i16HEX image across 64 KiB blocks', () => {
    const file = new IntelHexFile();
    file.addAll(0x00000, pseudoRandomBytes(20, 3));
    file.addAll(0x1fff8, pseudoRandomBytes(40, 4));
    file.addAll(0xf0000, pseudoRandomBytes(16, 5));
    file.startSegmentAddress = { codeSegment: 0x1234, instructionPointer: 0x5678 };
    expect(file.format).toBe('i16HEX');
    expectRoundTrip(file, 'i16HEX');
  });

  it('round-trips an i32HEX image up to the end of the address space', () => {
    const file = new IntelHexFile();
    file.addAll(0x00000000, pseudoRandomBytes(16, 6));
    file.addAll(0x0800fff8, pseudoRandomBytes(64, 7));
    file.addAll(0xffffff00, pseudoRandomBytes(256, 8));
    file.startLinearAddress = 0x80001234;
    file.lineLength = 7;
    expect(file.format).toBe('i32HEX');
    expect(file.maxAddress).toBe(0x1_0000_0000);
    expectRoundTrip(file, 'i32HEX');
  });

  it('writes i32HEX by default', () => {
    const file = IntelHexFile.fromData([0xde, 0xad, 0xbe, 0xef], 0x08000000);
    expect(file.toFileContents()).toBe(':020000040800F2\n:04000000DEADBEEFC4\n:00000001FF\n');
  });

  it('picks the smallest format', () => {
    expect(IntelHexFile.fromData(new Uint8Array(0x100)).format).toBe('i8HEX');
    expect(IntelHexFile.fromData([1], 0xffff).format).toBe('i16HEX');
    expect(IntelHexFile.fromData([1], 0xfffef).format).toBe('i16HEX');
    expect(IntelHexFile.fromData([1], 0xffff0).format).toBe('i32HEX');
  });

  it('validates the line length', () => {
    const file = new IntelHexFile();
    expect(file.lineLength).toBe(16);
    expect(
      hexErrorId(() => {
        file.lineLength = 0;
      }),
    ).toBe(DiagnosticIds.InvalidLineLength);
    expect(file.lineLength).toBe(16);
    file.lineLength = 255;
    expect(file.lineLength).toBe(255);
  });

  it('keeps a custom start token for writing', () => {
    const file = IntelHexFile.fromString('@0100000055AA\n@00000001FF\n', { startToken: '@' });
    expect(file.startCode).toBe('@');
    expect(file.toFileContents()).toBe('@0100000055AA\n@00000001FF\n');
    expect(file.toFileContents({ startToken: ':' })).toBe(':0100000055AA\n:00000001FF\n');
    expect(file.startCode).toBe(':');
    expect(hexErrorId(() => file.toFileContents({ startToken: 'ab' }))).toBe(
      DiagnosticIds.InvalidStartCode,
    );
  });

  it('rejects duplicate addresses unless allowed', () => {
    const text = ':020000001122CB\n:010001006698\n:00000001FF\n';
    expect(() => IntelHexFile.fromString(text)).toThrow(HexRangeError);
    const file = IntelHexFile.fromString(text, { allowDuplicateAddresses: true });
    expect(layout(file)).toEqual([{ address: 0, bytes: [0x11, 0x66] }]);
  });

  it('lists the usual file extensions', () => {
    const extensions = new IntelHexFile().fileExtensions();
    expect(extensions).toHaveLength(12);
    expect(extensions).toContain('.hex');
    expect(extensions).toContain('.ihex');
  });

  it('describes itself as JSON', () => {
    expect(IntelHexFile.fromData([1, 2], 0x10).toString()).toBe(
      '"Intel HEX" : { "segments": [{"start": 16,"end": 18}] }',
    );
  });
});
