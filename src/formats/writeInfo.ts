import { getSegmentRanges } from './range.js';
import type { HexImage, InfoArtifact, InfoJson, IntelHexFormat } from './types.js';
import { I16HEX_MAX_ADDRESS, I8HEX_MAX_ADDRESS } from './writeHex.js';

/**
 * Smallest record vocabulary that can represent every address up to `maxAddress` (exclusive).
 */
export function smallestFormat(maxAddress: number): IntelHexFormat {
  if (maxAddress <= I8HEX_MAX_ADDRESS) return 'i8HEX';
  if (maxAddress <= I16HEX_MAX_ADDRESS) return 'i16HEX';
  return 'i32HEX';
}

/**
 * Summarize an image: its smallest format, segment ranges and entry points.
 */
export function writeInfo(image: HexImage): InfoArtifact {
  const maxAddress = image.container.maxAddress;
  const json: InfoJson = {
    format: smallestFormat(maxAddress),
    maxAddress,
    segments: getSegmentRanges(image.container).map((r) => ({
      start: r.start,
      end: r.end,
      length: r.end - r.start,
    })),
  };
  if (image.startSegmentAddress !== undefined) {
    json.startSegmentAddress = { ...image.startSegmentAddress };
  }
  if (image.startLinearAddress !== undefined) {
    json.startLinearAddress = image.startLinearAddress;
  }
  return { kind: 'info', json };
}
