export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { DiagnosticIds } from './diagnostics/types.js';
export { HexError, HexRangeError, HexValueError, isHexError } from './diagnostics/errors.js';

export { appendChecksum, checksumOf, isValidChecksum } from './record/checksum.js';
export {
  createDataRecord,
  createEndOfFileRecord,
  createExtendedLinearAddressRecord,
  createExtendedSegmentAddressRecord,
  createStartLinearAddressRecord,
  createStartSegmentAddressRecord,
} from './record/encode.js';
export { HexRecord, parseRecord, parseRecordLine } from './record/decode.js';
export type { RecordType, StartSegmentAddress } from './record/types.js';
export { RecordTypeCodes } from './record/types.js';

export type { Endian, SegmentByte } from './memory/segment.js';
export { MemorySegment } from './memory/segment.js';
export { MemorySegmentContainer } from './memory/container.js';
export { MemorySegmentContainerBuilder } from './memory/builder.js';
export { validateAddressAndLength } from './memory/validation.js';

export type {
  Artifact,
  BinArtifact,
  HexArtifact,
  HexImage,
  InfoArtifact,
  InfoJson,
  IntelHexFormat,
  WriteBinOptions,
  WriteHexOptions,
} from './formats/types.js';
export {
  segmentToI16Records,
  segmentToI32Records,
  segmentToI8Records,
  validateLineLength,
  validateStartCode,
  writeHex,
} from './formats/writeHex.js';
export { writeBin } from './formats/writeBin.js';
export { smallestFormat, writeInfo } from './formats/writeInfo.js';
export { defaultFormatWriters } from './formats/index.js';

export type { ParseHexOptions, ParsedIntelHex } from './parse/parseHex.js';
export { parseIntelHex } from './parse/parseHex.js';

export { IntelHexFile, INTEL_HEX_FILE_EXTENSIONS } from './intelHexFile.js';

export type { ConvertOptions, ConvertResult, InputType, PipelineDeps } from './pipeline.js';
export { convert } from './convert.js';
