import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import { errorMessage, isHexError } from './diagnostics/errors.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact, HexImage } from './formats/types.js';
import { smallestFormat } from './formats/writeInfo.js';
import { MemorySegmentContainer } from './memory/container.js';
import { parseIntelHex } from './parse/parseHex.js';
import type {
  ConvertFn,
  ConvertOptions,
  ConvertResult,
  InputType,
  PipelineDeps,
} from './pipeline.js';

type EmitFlags = Required<Pick<ConvertOptions, 'emitHex' | 'emitBin' | 'emitInfo'>>;

function withDefaults(options: ConvertOptions): EmitFlags {
  const anyEmitSpecified = [options.emitHex, options.emitBin, options.emitInfo].some(
    (v) => v !== undefined,
  );
  // Without explicit choices, HEX is the only output.
  const emitHex = anyEmitSpecified ? (options.emitHex ?? false) : true;
  const emitBin = options.emitBin ?? false;
  const emitInfo = options.emitInfo ?? false;
  return { emitHex, emitBin, emitInfo };
}

export function inferInputType(inputPath: string): InputType {
  return extname(inputPath).toLowerCase() === '.bin' ? 'bin' : 'hex';
}

function toDiagnostic(err: unknown, file: string): Diagnostic {
  if (isHexError(err)) {
    return {
      id: err.id,
      severity: 'error',
      message: err.message,
      file,
      ...(err.line !== undefined ? { line: err.line } : {}),
    };
  }
  return {
    id: DiagnosticIds.Unknown,
    severity: 'error',
    message: `Internal error during conversion: ${errorMessage(err)}`,
    file,
  };
}

async function loadImage(
  inputPath: string,
  inputType: InputType,
  options: ConvertOptions,
): Promise<HexImage> {
  if (inputType === 'bin') {
    const bytes = await readFile(inputPath);
    return { container: MemorySegmentContainer.fromData(bytes, options.binAddress ?? 0) };
  }
  const text = await readFile(inputPath, 'utf8');
  return parseIntelHex(text, {
    startCode: options.startCode ?? ':',
    allowDuplicateAddresses: options.allowDuplicateAddresses ?? false,
  });
}

/**
 * Convert one input file (Intel HEX or flat binary) into in-memory artifacts.
 *
 * Rejected input never throws: read failures and codec errors are reported as diagnostics and
 * no artifacts are returned.
 */
export const convert: ConvertFn = async (
  inputPath: string,
  options: ConvertOptions,
  deps: PipelineDeps = { formats: defaultFormatWriters },
): Promise<ConvertResult> => {
  const diagnostics: Diagnostic[] = [];
  const inputType = options.inputType ?? inferInputType(inputPath);
  const emit = withDefaults(options);

  let image: HexImage;
  try {
    image = await loadImage(inputPath, inputType, options);
  } catch (err) {
    diagnostics.push(
      isHexError(err)
        ? toDiagnostic(err, inputPath)
        : {
            id: DiagnosticIds.IoReadFailed,
            severity: 'error',
            message: `Failed to read input file: ${errorMessage(err)}`,
            file: inputPath,
          },
    );
    return { diagnostics, artifacts: [] };
  }

  const artifacts: Artifact[] = [];
  try {
    if (emit.emitHex) {
      artifacts.push(
        deps.formats.writeHex(image, {
          format: options.format ?? smallestFormat(image.container.maxAddress),
          lineLength: options.lineLength ?? 16,
          startCode: options.startCode ?? ':',
          allowDuplicateAddresses: options.allowDuplicateAddresses ?? false,
        }),
      );
    }
    if (emit.emitBin) {
      artifacts.push(deps.formats.writeBin(image, { fill: options.fill ?? 0xff }));
    }
    if (emit.emitInfo) {
      artifacts.push(deps.formats.writeInfo(image));
    }
  } catch (err) {
    diagnostics.push(toDiagnostic(err, inputPath));
    return { diagnostics, artifacts: [] };
  }

  return { diagnostics, artifacts };
};
