import type { IntelHexFormat } from './formats/types.js';
import { smallestFormat } from './formats/writeInfo.js';
import { validateLineLength, validateStartCode, writeHex } from './formats/writeHex.js';
import { MemorySegmentContainer } from './memory/container.js';
import { parseIntelHex } from './parse/parseHex.js';
import type { StartSegmentAddress } from './record/types.js';

/** File extensions commonly used for Intel HEX files. */
export const INTEL_HEX_FILE_EXTENSIONS: readonly string[] = [
  '.hex',
  '.h86',
  '.hxl',
  '.hxh',
  '.obl',
  '.obh',
  '.mcs',
  '.ihex',
  '.ihe',
  '.ihx',
  '.a43',
  '.a90',
];

/**
 * An Intel HEX file: a segment container plus record mark, line length and entry points.
 *
 * Parse a file with {@link IntelHexFile.fromString}; build one from binary data with
 * {@link IntelHexFile.fromData} or by adding segments, then write it with {@link toFileContents}.
 */
export class IntelHexFile extends MemorySegmentContainer {
  /** Initial CS:IP for 80x86 CPUs, when the file has a type `03` record. */
  startSegmentAddress?: StartSegmentAddress;
  /** 32-bit entry point, when the file has a type `05` record. */
  startLinearAddress?: number;
  /** Record mark used when writing. */
  startCode = ':';

  private bytesPerRecord = 16;

  static override fromData(data: ArrayLike<number>, address = 0): IntelHexFile {
    const file = new IntelHexFile();
    file.addAll(address, data);
    return file;
  }

  /**
   * Parse HEX text. A non-default `startToken` also becomes the file's {@link startCode}.
   *
   * Unless `allowDuplicateAddresses` is set, data records that share an address are rejected.
   */
  static fromString(
    text: string,
    opts: { startToken?: string; allowDuplicateAddresses?: boolean } = {},
  ): IntelHexFile {
    const parsed = parseIntelHex(text, {
      startCode: opts.startToken ?? ':',
      allowDuplicateAddresses: opts.allowDuplicateAddresses ?? false,
    });
    const file = new IntelHexFile();
    file.startCode = parsed.startCode;
    if (parsed.startSegmentAddress !== undefined) {
      file.startSegmentAddress = parsed.startSegmentAddress;
    }
    if (parsed.startLinearAddress !== undefined) {
      file.startLinearAddress = parsed.startLinearAddress;
    }
    for (const seg of parsed.container.segments) {
      file.addSegment(seg);
    }
    return file;
  }

  /** Bytes per data record, 1..255. */
  get lineLength(): number {
    return this.bytesPerRecord;
  }

  set lineLength(value: number) {
    validateLineLength(value);
    this.bytesPerRecord = value;
  }

  /** Smallest format that can represent every segment. */
  get format(): IntelHexFormat {
    return smallestFormat(this.maxAddress);
  }

  /**
   * Serialize the file. A given `startToken` replaces {@link startCode} for this and later writes.
   */
  toFileContents(
    opts: { format?: IntelHexFormat; startToken?: string; allowDuplicateAddresses?: boolean } = {},
  ): string {
    if (opts.startToken !== undefined) {
      validateStartCode(opts.startToken);
      this.startCode = opts.startToken;
    }
    const image = {
      container: this,
      ...(this.startSegmentAddress !== undefined
        ? { startSegmentAddress: this.startSegmentAddress }
        : {}),
      ...(this.startLinearAddress !== undefined
        ? { startLinearAddress: this.startLinearAddress }
        : {}),
    };
    return writeHex(image, {
      format: opts.format ?? 'i32HEX',
      lineLength: this.bytesPerRecord,
      startCode: this.startCode,
      allowDuplicateAddresses: opts.allowDuplicateAddresses ?? false,
    }).text;
  }

  fileExtensions(): string[] {
    return [...INTEL_HEX_FILE_EXTENSIONS];
  }

  override toString(): string {
    return `"Intel HEX" : { ${super.toString()} }`;
  }
}
