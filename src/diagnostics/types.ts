/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A conversion diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `IHX001`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /**
   * Unknown/unclassified diagnostic.
   *
   * Use a more specific ID when possible.
   */
  Unknown: 'IHX000',

  /** Failed to read an input file from disk. */
  IoReadFailed: 'IHX001',

  /** Generic range error (field width, address span, overlapping segments). */
  RangeError: 'IHX100',

  /** A segment was accessed outside its address range. */
  OutOfSegment: 'IHX101',

  /** Address or length is negative or does not fit 32 bits. */
  AddressOutOfRange: 'IHX102',

  /** The chosen presentation format cannot represent a segment. */
  FormatRangeExceeded: 'IHX103',

  /** Two segments or records cover the same address. */
  OverlappingSegments: 'IHX104',

  /** Generic value error (malformed input or configuration). */
  ValueError: 'IHX200',

  /** Record checksum does not sum to zero. */
  BadChecksum: 'IHX201',

  /** Record byte count does not match its payload. */
  BadLength: 'IHX202',

  /** Record type byte is outside 0..5. */
  UnknownRecordType: 'IHX203',

  /** Record is shorter than its declared length. */
  TruncatedRecord: 'IHX204',

  /** A record character is not a hexadecimal digit. */
  InvalidHexDigit: 'IHX205',

  /** A start address record occurs more than once. */
  DuplicateStartRecord: 'IHX206',

  /** No record mark where one was expected. */
  MissingStartCode: 'IHX207',

  /** The record mark is not exactly one character. */
  InvalidStartCode: 'IHX208',

  /** Bytes per data record outside 1..255. */
  InvalidLineLength: 'IHX209',

  /** A record could not be parsed; wraps the underlying cause with its line. */
  ParseFailed: 'IHX210',

  /** A typed record accessor was used on the wrong record type or size. */
  RecordAccessMismatch: 'IHX211',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
