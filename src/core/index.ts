import type { CodecOptions, HevcConfig } from '../types/Types';
import { ByteStream } from './ByteStream';
import { readBoxHeader } from './BoxHeader';
import { HevcSampleEntry } from './HevcSampleEntry';
import { InitSegmentParser, type LocatedSampleEntry } from './InitSegmentParser';

export * from './BoxHeader';
export * from './ByteStream';
export * from './Errors';
export * from './FixedPoint16';
export * from './HevcDecoderConfigRecord';
export * from './HevcSampleEntry';
export * from './InitSegmentParser';
export * from './NalUnit';

function validateConfig(config: HevcConfig) {
	for (const [label, value] of [['width', config.width], ['height', config.height]] as const) {
		if (!Number.isInteger(value) || value <= 0 || value > 0xffff) {
			throw new Error(`${label} must be an integer in [1, 65535], got ${value}`);
		}
	}
}

/** Builds and serializes a standalone hvc1/hev1 box. */
export function encodeHevcSampleEntry(config: HevcConfig): Uint8Array {
	validateConfig(config);
	const entry = HevcSampleEntry.fromConfig(config);
	const stream = new ByteStream(entry.size);
	entry.encode(stream);
	return stream.bytes;
}

/** Decodes a buffer that starts with an hvc1/hev1 box header. */
export function decodeHevcSampleEntry(input: ArrayBuffer | Uint8Array, opts: CodecOptions = {}): HevcSampleEntry {
	const stream = ByteStream.from(input);
	const header = readBoxHeader(stream);
	return HevcSampleEntry.decode(stream, header, opts);
}

export function findHevcSampleEntries(input: ArrayBuffer | Uint8Array, opts: CodecOptions = {}): LocatedSampleEntry[] {
	return new InitSegmentParser(opts).parse(input);
}

export default {
	encodeHevcSampleEntry,
	decodeHevcSampleEntry,
	findHevcSampleEntries,
};
