function byteSum(bytes: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < bytes.length; i++) {
    sum = (sum + ((bytes[i] ?? 0) & 0xff)) & 0xff;
  }
  return sum;
}

/**
 * Two's-complement of the 8-bit sum of `bytes`.
 */
export function checksumOf(bytes: ArrayLike<number>): number {
  return (0x100 - byteSum(bytes)) & 0xff;
}

/**
 * Copy `bytes` and append their checksum, so the result sums to zero (mod 256).
 */
export function appendChecksum(bytes: ArrayLike<number>): Uint8Array {
  const out = new Uint8Array(bytes.length + 1);
  out.set(bytes);
  out[bytes.length] = checksumOf(bytes);
  return out;
}

/**
 * True when the byte sum of a record, including its trailing checksum byte, is zero (mod 256).
 */
export function isValidChecksum(bytes: ArrayLike<number>): boolean {
  return byteSum(bytes) === 0;
}
