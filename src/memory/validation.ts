import { DiagnosticIds } from '../diagnostics/types.js';
import { HexRangeError } from '../diagnostics/errors.js';

/** One past the highest address representable in a HEX file. */
export const ADDRESS_SPACE_END = 0x1_0000_0000;

/**
 * Check that `[address, address + length)` lies within the 32-bit address space.
 */
export function validateAddressAndLength(address: number, length: number): void {
  if (!Number.isInteger(address) || address < 0) {
    throw new HexRangeError(
      `Address must be a non-negative integer! Got ${address}`,
      DiagnosticIds.AddressOutOfRange,
    );
  }
  if (!Number.isInteger(length) || length < 0) {
    throw new HexRangeError(
      `Length must be a non-negative integer! Got ${length}`,
      DiagnosticIds.AddressOutOfRange,
    );
  }
  if (address + length > ADDRESS_SPACE_END) {
    throw new HexRangeError(
      `Address range [${address}, ${address + length}[ exceeds the 32 bit address space!`,
      DiagnosticIds.AddressOutOfRange,
    );
  }
}
