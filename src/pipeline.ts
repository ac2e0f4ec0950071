import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters, IntelHexFormat } from './formats/types.js';

export type InputType = 'hex' | 'bin';

/**
 * Options that influence conversion and which artifacts are produced.
 */
export interface ConvertOptions {
  /** Input kind; inferred from the file extension (`.bin` → `bin`, anything else → `hex`). */
  inputType?: InputType;
  /** Load address of a binary input (default 0). */
  binAddress?: number;
  /** Output record vocabulary; defaults to the smallest one that fits the image. */
  format?: IntelHexFormat;
  /** Bytes per output data record, 1..255 (default 16). */
  lineLength?: number;
  /** Record mark for both input and output (default `:`). */
  startCode?: string;
  /** Accept overlapping data records on input and overlapping segments on output. */
  allowDuplicateAddresses?: boolean;
  /** Gap fill for binary output (default `0xff`). */
  fill?: number;
  /** Emit Intel HEX. */
  emitHex?: boolean;
  /** Emit a flat binary image. */
  emitBin?: boolean;
  /** Emit a JSON summary of the image. */
  emitInfo?: boolean;
}

/**
 * Result of a conversion run: diagnostics plus any produced artifacts.
 */
export interface ConvertResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the conversion pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can stay in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level convert function signature used by the pipeline contract.
 */
export type ConvertFn = (
  inputPath: string,
  options: ConvertOptions,
  deps?: PipelineDeps,
) => Promise<ConvertResult>;
