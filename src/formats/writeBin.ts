import { getImageRange } from './range.js';
import type { BinArtifact, HexImage, WriteBinOptions } from './types.js';

/**
 * Create a flat binary artifact from a memory image.
 *
 * Bytes are emitted from the lowest to the highest segment address; gaps between segments are
 * filled with `opts.fill` (default `0xff`).
 */
export function writeBin(image: HexImage, opts?: WriteBinOptions): BinArtifact {
  const { start, end } = getImageRange(image.container);
  const out = new Uint8Array(Math.max(0, end - start));
  out.fill(opts?.fill ?? 0xff);
  for (const seg of image.container.segments) {
    out.set(seg.bytes, seg.address - start);
  }
  return { kind: 'bin', address: start, bytes: out };
}
