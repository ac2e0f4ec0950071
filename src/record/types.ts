/**
 * Intel HEX record kinds.
 *
 * Wire values: data `00`, endOfFile `01`, extendedSegmentAddress `02`, startSegmentAddress `03`,
 * extendedLinearAddress `04`, startLinearAddress `05`.
 */
export type RecordType =
  | 'data'
  | 'endOfFile'
  | 'extendedSegmentAddress'
  | 'startSegmentAddress'
  | 'extendedLinearAddress'
  | 'startLinearAddress';

/**
 * Record type byte for each record kind.
 */
export const RecordTypeCodes = {
  data: 0x00,
  endOfFile: 0x01,
  extendedSegmentAddress: 0x02,
  startSegmentAddress: 0x03,
  extendedLinearAddress: 0x04,
  startLinearAddress: 0x05,
} as const satisfies Record<RecordType, number>;

/**
 * Map a record type byte back to its kind, or `undefined` for bytes outside `0..5`.
 */
export function recordTypeFromByte(code: number): RecordType | undefined {
  switch (code) {
    case 0x00:
      return 'data';
    case 0x01:
      return 'endOfFile';
    case 0x02:
      return 'extendedSegmentAddress';
    case 0x03:
      return 'startSegmentAddress';
    case 0x04:
      return 'extendedLinearAddress';
    case 0x05:
      return 'startLinearAddress';
    default:
      return undefined;
  }
}

/**
 * Start segment address (type `03`): the initial CS:IP of an 80x86 CPU.
 */
export interface StartSegmentAddress {
  /** Code segment, 16 bits. */
  codeSegment: number;
  /** Instruction pointer, 16 bits. */
  instructionPointer: number;
}

export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${String(value)}`);
}
