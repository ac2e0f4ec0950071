import type { MemorySegmentContainer } from '../memory/container.js';
import type { StartSegmentAddress } from '../record/types.js';

/**
 * Record vocabulary used when writing a HEX file.
 *
 * - `i8HEX`: data and end-of-file records only; segments must end at or below 65535.
 * - `i16HEX`: adds extended segment address records; segments must end at or below 1048560.
 * - `i32HEX`: adds extended linear address records; full 32-bit range.
 */
export type IntelHexFormat = 'i8HEX' | 'i16HEX' | 'i32HEX';

export const INTEL_HEX_FORMATS: readonly IntelHexFormat[] = ['i8HEX', 'i16HEX', 'i32HEX'];

/**
 * A sparse memory image plus the optional entry points stored alongside it.
 */
export interface HexImage {
  container: MemorySegmentContainer;
  startSegmentAddress?: StartSegmentAddress;
  startLinearAddress?: number;
}

/**
 * Options for Intel HEX writing.
 */
export interface WriteHexOptions {
  /** Record vocabulary (default `i32HEX`). */
  format?: IntelHexFormat;
  /** Bytes per data record, 1..255 (default 16). */
  lineLength?: number;
  /** Record mark (default `:`). */
  startCode?: string;
  /**
   * Skip the overlapping-segment check.
   *
   * When unset, segments sharing an address raise a range error before anything is written.
   */
  allowDuplicateAddresses?: boolean;
}

/**
 * Options for flat binary writing.
 */
export interface WriteBinOptions {
  /** Value for addresses between segments (default `0xff`, the erased state of flash). */
  fill?: number;
}

/**
 * In-memory Intel HEX artifact.
 */
export interface HexArtifact {
  kind: 'hex';
  path?: string;
  text: string;
}

/**
 * In-memory flat binary artifact. `address` is the absolute address of `bytes[0]`.
 */
export interface BinArtifact {
  kind: 'bin';
  path?: string;
  address: number;
  bytes: Uint8Array;
}

/**
 * Summary of an image: smallest format, segment ranges and entry points.
 */
export interface InfoJson {
  format: IntelHexFormat;
  maxAddress: number;
  segments: Array<{ start: number; end: number; length: number }>;
  startSegmentAddress?: StartSegmentAddress;
  startLinearAddress?: number;
}

/**
 * In-memory summary artifact.
 */
export interface InfoArtifact {
  kind: 'info';
  path?: string;
  json: InfoJson;
}

/**
 * Union of all artifact kinds produced by the converter.
 */
export type Artifact = HexArtifact | BinArtifact | InfoArtifact;

/**
 * Format writers used by the pipeline to turn an image into artifacts.
 */
export interface FormatWriters {
  writeHex(image: HexImage, opts?: WriteHexOptions): HexArtifact;
  writeBin(image: HexImage, opts?: WriteBinOptions): BinArtifact;
  writeInfo(image: HexImage): InfoArtifact;
}
