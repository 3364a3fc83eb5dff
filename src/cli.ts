#!/usr/bin/env node

import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
  HEVC_SAMPLE_ENTRY_TYPES,
  encodeHevcSampleEntry,
  findHevcSampleEntries,
  isHevcSampleEntryType,
} from './core/index';
import type { HevcSampleEntryType } from './types/Types';

type InspectOptions = {
  command: 'inspect';
  inputPath: string;
  json: boolean;
  debug: boolean;
};

type BuildOptions = {
  command: 'build';
  outPath: string;
  width: number;
  height: number;
  type: HevcSampleEntryType;
  vps: string[];
  sps: string[];
  pps: string[];
  sei: string[];
};

type CliOptions = InspectOptions | BuildOptions;

function printHelp(): void {
  process.stdout.write(`\
Inspect or build HEVC sample entry (hvc1/hev1) boxes.

Usage:
  hevc-sample-entry inspect <file> [--json] [--debug]
  hevc-sample-entry build --width <w> --height <h> [parameter sets] [--type hvc1|hev1] [--out <path>]

Inspect options:
  --json                Print the full structure of every entry as JSON
  --debug               Trace box headers while decoding

Build options:
  --width <n>           Coded width in pixels
  --height <n>          Coded height in pixels
  --vps <file>          Raw video parameter set NAL unit (repeatable)
  --sps <file>          Raw sequence parameter set NAL unit (repeatable)
  --pps <file>          Raw picture parameter set NAL unit (repeatable)
  --sei <file>          Raw SEI NAL unit (repeatable)
  --type <type>         Sample entry type: ${HEVC_SAMPLE_ENTRY_TYPES.join(', ')} (default: hvc1)
  --out <path>          Output path (default: ./hvc1.bin)

  -h, --help            Show help

Examples:
  hevc-sample-entry inspect init.mp4
  hevc-sample-entry build --width 1920 --height 1080 --sps sps.bin --pps pps.bin --out hvc1.bin
`);
}

function requireValue(argv: string[], i: number, flag: string): string {
  const value = argv[i];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

function parseDimension(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0 || n > 0xffff) {
    throw new Error(`${flag} must be an integer in [1, 65535], got '${value}'`);
  }
  return n;
}

function parseInspectArgs(argv: string[]): InspectOptions {
  let inputPath: string | undefined;
  let json = false;
  let debug = false;

  for (const arg of argv) {
    if (arg === '--json') {
      json = true;
      continue;
    }
    if (arg === '--debug') {
      debug = true;
      continue;
    }
    if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    }
    if (inputPath) {
      throw new Error('inspect takes a single input file.');
    }
    inputPath = path.resolve(process.cwd(), arg);
  }

  if (!inputPath) throw new Error('No input file provided.');
  return { command: 'inspect', inputPath, json, debug };
}

function parseBuildArgs(argv: string[]): BuildOptions {
  const options: BuildOptions = {
    command: 'build',
    outPath: path.resolve(process.cwd(), 'hvc1.bin'),
    width: 0,
    height: 0,
    type: 'hvc1',
    vps: [],
    sps: [],
    pps: [],
    sei: [],
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--width':
        options.width = parseDimension(requireValue(argv, ++i, arg), arg);
        break;
      case '--height':
        options.height = parseDimension(requireValue(argv, ++i, arg), arg);
        break;
      case '--out':
        options.outPath = path.resolve(process.cwd(), requireValue(argv, ++i, arg));
        break;
      case '--type': {
        const type = requireValue(argv, ++i, arg);
        if (!isHevcSampleEntryType(type)) throw new Error(`Unsupported sample entry type: ${type}`);
        options.type = type;
        break;
      }
      case '--vps':
        options.vps.push(path.resolve(process.cwd(), requireValue(argv, ++i, arg)));
        break;
      case '--sps':
        options.sps.push(path.resolve(process.cwd(), requireValue(argv, ++i, arg)));
        break;
      case '--pps':
        options.pps.push(path.resolve(process.cwd(), requireValue(argv, ++i, arg)));
        break;
      case '--sei':
        options.sei.push(path.resolve(process.cwd(), requireValue(argv, ++i, arg)));
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  if (!options.width || !options.height) {
    throw new Error('build requires --width and --height.');
  }
  return options;
}

function parseArgs(argv: string[]): CliOptions | { help: true } {
  const [command, ...rest] = argv;
  if (command === undefined || command === '-h' || command === '--help') return { help: true };
  if (rest.includes('-h') || rest.includes('--help')) return { help: true };

  if (command === 'inspect') return parseInspectArgs(rest);
  if (command === 'build') return parseBuildArgs(rest);
  throw new Error(`Unknown command: ${command}`);
}

async function readAll(paths: string[]): Promise<Uint8Array[]> {
  return Promise.all(paths.map(async (p) => new Uint8Array(await readFile(p))));
}

async function inspect(options: InspectOptions): Promise<void> {
  const data = new Uint8Array(await readFile(options.inputPath));
  const located = findHevcSampleEntries(data, { debug: options.debug });

  if (!located.length) {
    throw new Error(`No hvc1/hev1 sample entries found in ${options.inputPath}`);
  }

  if (options.json) {
    const dump = located.map(({ trackId, offset, entry }) => ({ trackId, offset, ...entry.toJSON() }));
    process.stdout.write(`${JSON.stringify(dump, null, 2)}\n`);
    return;
  }

  for (const { trackId, offset, entry } of located) {
    const track = trackId === null ? '-' : String(trackId);
    process.stdout.write(`track=${track} ${entry.type}@${offset} ${entry.summary()} ${entry.config.summary()}\n`);
  }
}

async function build(options: BuildOptions): Promise<void> {
  const [videoParameterSets, sequenceParameterSets, pictureParameterSets, supplementalEnhancementInformation] =
    await Promise.all([options.vps, options.sps, options.pps, options.sei].map(readAll));

  const bytes = encodeHevcSampleEntry({
    type: options.type,
    width: options.width,
    height: options.height,
    videoParameterSets,
    sequenceParameterSets,
    pictureParameterSets,
    supplementalEnhancementInformation,
  });

  await writeFile(options.outPath, bytes);
  process.stdout.write(`✔ Wrote ${options.outPath} (${bytes.byteLength} bytes)\n`);
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));

  if ('help' in parsed) {
    printHelp();
    return;
  }

  if (parsed.command === 'inspect') await inspect(parsed);
  else await build(parsed);
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${msg}\n\n`);
  printHelp();
  process.exit(1);
});
