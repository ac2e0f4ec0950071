import { DiagnosticIds } from '../diagnostics/types.js';
import { HexValueError, errorMessage } from '../diagnostics/errors.js';
import type { HexImage } from '../formats/types.js';
import { MemorySegmentContainerBuilder } from '../memory/builder.js';
import { MemorySegment } from '../memory/segment.js';
import type { HexRecord } from '../record/decode.js';
import { parseRecord } from '../record/decode.js';
import type { StartSegmentAddress } from '../record/types.js';
import { assertNever } from '../record/types.js';

/**
 * Options for {@link parseIntelHex}.
 */
export interface ParseHexOptions {
  /** Record mark; must be exactly one character (default `:`). */
  startCode?: string;
  /**
   * Accept data records that share addresses; the record at the higher start address wins, and
   * among records with the same start address the later one wins.
   */
  allowDuplicateAddresses?: boolean;
}

/**
 * Result of parsing a HEX stream.
 */
export interface ParsedIntelHex extends HexImage {
  startCode: string;
}

/**
 * Registers and entry points of one parse. Lives for a single {@link parseIntelHex} call.
 */
interface ParseState {
  /** Base from the last type `02` record, already multiplied by 16. */
  extendedSegmentAddress: number;
  /** Base from the last type `04` record, already shifted left by 16. */
  extendedLinearAddress: number;
  startSegmentAddress?: StartSegmentAddress;
  startLinearAddress?: number;
  done: boolean;
}

function dispatch(
  state: ParseState,
  record: HexRecord,
  builder: MemorySegmentContainerBuilder,
): void {
  const type = record.recordType;
  switch (type) {
    case 'data': {
      const address =
        record.address + state.extendedLinearAddress + state.extendedSegmentAddress;
      builder.add(MemorySegment.fromBytes({ address, data: record.payload }));
      return;
    }
    case 'endOfFile':
      state.done = true;
      return;
    case 'extendedSegmentAddress':
      state.extendedSegmentAddress = record.extendedSegmentAddress;
      return;
    case 'extendedLinearAddress':
      state.extendedLinearAddress = record.extendedLinearAddress;
      return;
    case 'startSegmentAddress':
      if (state.startSegmentAddress !== undefined) {
        throw new HexValueError(
          'Start segment address record occurs more than once!',
          DiagnosticIds.DuplicateStartRecord,
        );
      }
      state.startSegmentAddress = record.startSegmentAddress;
      return;
    case 'startLinearAddress':
      if (state.startLinearAddress !== undefined) {
        throw new HexValueError(
          'Start linear address record occurs more than once!',
          DiagnosticIds.DuplicateStartRecord,
        );
      }
      state.startLinearAddress = record.startLinearAddress;
      return;
    default:
      assertNever(type, 'record type');
  }
}

/**
 * Decode and apply the record at `offset`. Returns the number of characters it occupies.
 */
function consumeRecord(
  text: string,
  offset: number,
  startCode: string,
  state: ParseState,
  builder: MemorySegmentContainerBuilder,
): number {
  const record = parseRecord(text, offset, startCode);
  dispatch(state, record, builder);
  return record.stringLength;
}

/**
 * Parse Intel HEX text into a memory image.
 *
 * Text outside records is ignored: lines without the record mark, and characters before the mark.
 * Parsing stops at the first end-of-file record. Any malformed record aborts the whole parse with
 * a {@link HexValueError} naming the 1-based line; overlapping data records raise a range error
 * unless `allowDuplicateAddresses` is set.
 */
export function parseIntelHex(text: string, options: ParseHexOptions = {}): ParsedIntelHex {
  const startCode = options.startCode ?? ':';
  if (startCode.length !== 1) {
    throw new HexValueError(
      `The startToken string can only be 1 character long, got ${startCode.length} - string: '${startCode}'`,
      DiagnosticIds.InvalidStartCode,
    );
  }
  const mark = startCode.charCodeAt(0);
  const state: ParseState = { extendedSegmentAddress: 0, extendedLinearAddress: 0, done: false };
  const builder = new MemorySegmentContainerBuilder();

  let line = 1;
  for (let i = 0; i < text.length && !state.done; i++) {
    const code = text.charCodeAt(i);
    if (code === 0x0a) {
      line++;
      continue;
    }
    if (code !== mark) continue;

    let consumed: number;
    try {
      consumed = consumeRecord(text, i, startCode, state, builder);
    } catch (err) {
      throw new HexValueError(
        `Parsing error on line ${line} : ${errorMessage(err)}`,
        DiagnosticIds.ParseFailed,
        { line, cause: err },
      );
    }
    // Records hold only hex digits, so no newline is skipped here.
    i += consumed - 1;
  }

  const result: ParsedIntelHex = {
    container: builder.build(options.allowDuplicateAddresses ?? false),
    startCode,
  };
  if (state.startSegmentAddress !== undefined) {
    result.startSegmentAddress = state.startSegmentAddress;
  }
  if (state.startLinearAddress !== undefined) {
    result.startLinearAddress = state.startLinearAddress;
  }
  return result;
}
