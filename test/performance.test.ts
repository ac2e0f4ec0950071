import { describe, expect, it } from 'vitest';

import { IntelHexFile } from '../src/intelHexFile.js';

const ONE_MIB = 1024 * 1024;

function countMismatches(bytes: Uint8Array): number {
  let mismatches = 0;
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] !== (i & 0xff)) mismatches++;
  }
  return mismatches;
}

describe('1 MiB image', () => {
  const data = new Uint8Array(ONE_MIB);
  for (let i = 0; i < data.length; i++) data[i] = i & 0xff;

  // 65536 data records of 44 characters, 15 extended linear address records and end-of-file.
  const expectedLength = 65536 * 44 + 15 * 16 + 12;

  it('serializes within a second', () => {
    const file = IntelHexFile.fromData(data);
    const started = performance.now();
    const text = file.toFileContents({ format: 'i32HEX' });
    expect(performance.now() - started).toBeLessThan(1000);
    expect(text).toHaveLength(expectedLength);
    expect(text.startsWith(':10000000000102030405060708090A0B0C0D0E0F')).toBe(true);
  });

  it('parses within a second', () => {
    const text = IntelHexFile.fromData(data).toFileContents({ format: 'i32HEX' });
    for (const source of [text, text.toLowerCase()]) {
      const started = performance.now();
      const file = IntelHexFile.fromString(source);
      expect(performance.now() - started).toBeLessThan(1000);
      expect(file.segments).toHaveLength(1);
      const seg = file.segments[0]!;
      expect(seg.address).toBe(0);
      expect(seg.length).toBe(ONE_MIB);
      expect(countMismatches(seg.bytes)).toBe(0);
    }
  });
});
