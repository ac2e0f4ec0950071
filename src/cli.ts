#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { convert } from './convert.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact, IntelHexFormat } from './formats/types.js';
import { INTEL_HEX_FORMATS } from './formats/types.js';
import { INTEL_HEX_FILE_EXTENSIONS } from './intelHexFile.js';
import type { ConvertOptions } from './pipeline.js';

type CliExit = { code: number };

type OutputType = 'hex' | 'bin';

type CliOptions = {
  inputFile: string;
  outputPath?: string;
  outputType: OutputType;
  format?: IntelHexFormat;
  lineLength: number;
  startCode: string;
  binAddress: number;
  fill: number;
  allowDuplicates: boolean;
  info: boolean;
};

function usage(): string {
  return [
    'ihex [options] <input>',
    '',
    'Options:',
    '  -o, --output <file>      Output path (must match --type extension)',
    '  -t, --type <type>        Output type: hex|bin (default: hex)',
    '  -f, --format <fmt>       HEX record format: i8HEX|i16HEX|i32HEX (default: smallest that fits)',
    '  -l, --line-length <n>    Data bytes per HEX record, 1..255 (default: 16)',
    '      --start-code <c>     Record mark for input and output (default: ":")',
    '      --address <n>        Load address of a .bin input (default: 0)',
    '      --fill <n>           Gap fill byte for .bin output (default: 0xff)',
    '      --allow-duplicates   Accept overlapping data records (higher address wins)',
    '      --info               Print a JSON summary of the image',
    '  -V, --version            Print version',
    '  -h, --help               Show help',
    '',
    'Notes:',
    '  - <input> must be the last argument; a .bin extension selects binary input.',
    '  - Numbers accept decimal or 0x-prefixed hex.',
    '  - With --info and no --output, nothing is written.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function parseNumber(flag: string, value: string): number {
  if (/^0x[0-9a-f]+$/i.test(value)) return parseInt(value.slice(2), 16);
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return fail(`${flag} expects a decimal or 0x-prefixed number, got "${value}"`);
}

function isFormat(value: string): value is IntelHexFormat {
  return (INTEL_HEX_FORMATS as readonly string[]).includes(value);
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let outputType: OutputType = 'hex';
  let format: IntelHexFormat | undefined;
  let lineLength = 16;
  let startCode = ':';
  let binAddress = 0;
  let fill = 0xff;
  let allowDuplicates = false;
  let info = false;
  let inputFile: string | undefined;

  let i = 0;
  while (i < argv.length) {
    const a = argv[i++]!;
    const is = (short: string | undefined, long: string): boolean =>
      a === short || a === long || a.startsWith(`${long}=`);
    const value = (long: string): string => {
      const v = a.startsWith(`${long}=`) ? a.slice(long.length + 1) : argv[i++];
      if (!v) fail(`${a.split('=')[0]} expects a value`);
      return v;
    };

    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      const require = createRequire(import.meta.url);
      const here = dirname(fileURLToPath(import.meta.url));
      const packageJsonPath = resolve(here, '..', '..', 'package.json');
      const pkg = require(packageJsonPath) as { version?: unknown };
      process.stdout.write(`${String(pkg.version ?? '0.0.0')}\n`);
      return { code: 0 };
    }
    if (is('-o', '--output')) {
      outputPath = value('--output');
      continue;
    }
    if (is('-t', '--type')) {
      const v = value('--type');
      if (v !== 'hex' && v !== 'bin') fail(`Unsupported --type "${v}" (expected hex|bin)`);
      outputType = v;
      continue;
    }
    if (is('-f', '--format')) {
      const v = value('--format');
      if (!isFormat(v)) {
        fail(`Unsupported --format "${v}" (expected ${INTEL_HEX_FORMATS.join('|')})`);
      }
      format = v;
      continue;
    }
    if (is('-l', '--line-length')) {
      lineLength = parseNumber('--line-length', value('--line-length'));
      if (lineLength < 1 || lineLength > 255) {
        fail(`--line-length must be between 1 and 255, got ${lineLength}`);
      }
      continue;
    }
    if (is(undefined, '--start-code')) {
      startCode = value('--start-code');
      if (startCode.length !== 1) fail(`--start-code must be a single character`);
      continue;
    }
    if (is(undefined, '--address')) {
      binAddress = parseNumber('--address', value('--address'));
      continue;
    }
    if (is(undefined, '--fill')) {
      fill = parseNumber('--fill', value('--fill'));
      if (fill > 0xff) fail(`--fill must be a byte value, got ${fill}`);
      continue;
    }
    if (a === '--allow-duplicates') {
      allowDuplicates = true;
      continue;
    }
    if (a === '--info') {
      info = true;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (inputFile !== undefined || i !== argv.length) {
      fail(`Expected exactly one <input> argument (and it must be last)`);
    }
    inputFile = a;
  }

  if (!inputFile) {
    fail(`Expected exactly one <input> argument (and it must be last)`);
  }

  if (outputPath) {
    const ext = extname(outputPath).toLowerCase();
    const accepted = outputType === 'hex' ? INTEL_HEX_FILE_EXTENSIONS : ['.bin'];
    if (!accepted.includes(ext)) {
      fail(`--output must end with "${accepted[0] ?? ''}" when --type is "${outputType}"`);
    }
  }

  return {
    inputFile,
    ...(outputPath ? { outputPath } : {}),
    outputType,
    ...(format ? { format } : {}),
    lineLength,
    startCode,
    binAddress,
    fill,
    allowDuplicates,
    info,
  };
}

function defaultOutputPath(inputFile: string, outputType: OutputType): string {
  const input = resolve(inputFile);
  const ext = extname(input);
  const stem = ext.length > 0 ? input.slice(0, -ext.length) : input;
  const out = `${stem}.${outputType}`;
  if (out === input) {
    fail(`--output is required when the default output path would overwrite the input`);
  }
  return out;
}

async function writeArtifacts(
  outputPath: string | undefined,
  artifacts: Artifact[],
): Promise<void> {
  for (const a of artifacts) {
    if (a.kind === 'info') {
      process.stdout.write(`${JSON.stringify(a.json, null, 2)}\n`);
    }
  }
  if (outputPath === undefined) return;

  for (const a of artifacts) {
    if (a.kind === 'hex') {
      await mkdir(dirname(outputPath), { recursive: true });
      await writeFile(outputPath, a.text, 'utf8');
    } else if (a.kind === 'bin') {
      await mkdir(dirname(outputPath), { recursive: true });
      await writeFile(outputPath, a.bytes);
    }
  }
  process.stdout.write(`${outputPath}\n`);
}

function formatDiagnostic(d: Diagnostic): string {
  const loc = d.line !== undefined ? `${d.file}:${d.line}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}\n`;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const writeOutput = !parsed.info || parsed.outputPath !== undefined;
    const outputPath = writeOutput
      ? resolve(parsed.outputPath ?? defaultOutputPath(parsed.inputFile, parsed.outputType))
      : undefined;

    const options: ConvertOptions = {
      lineLength: parsed.lineLength,
      startCode: parsed.startCode,
      binAddress: parsed.binAddress,
      fill: parsed.fill,
      allowDuplicateAddresses: parsed.allowDuplicates,
      emitHex: writeOutput && parsed.outputType === 'hex',
      emitBin: writeOutput && parsed.outputType === 'bin',
      emitInfo: parsed.info,
      ...(parsed.format ? { format: parsed.format } : {}),
    };
    const res = await convert(parsed.inputFile, options, { formats: defaultFormatWriters });

    for (const d of res.diagnostics) {
      process.stderr.write(formatDiagnostic(d));
    }
    if (res.diagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    await writeArtifacts(outputPath, res.artifacts);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`ihex: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const invoked = normalizePathForCompare(invokedAs);
  const self = normalizePathForCompare(fileURLToPath(import.meta.url));
  if (invoked === self) return true;
  // npm bin shims can surface a different spelling of the same built entry.
  return invoked.endsWith('/dist/src/cli.js') && self.endsWith('/dist/src/cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
