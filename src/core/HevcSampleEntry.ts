import type { BoxHeader, CodecOptions, HevcConfig, HevcSampleEntryType, Mp4Box } from '../types/Types';
import { dbg } from '../utils/debug';
import type { ByteStream } from './ByteStream';
import { HEADER_SIZE, boxStart, readBoxHeader, skipBytesTo, writeBoxHeader, writeZeros } from './BoxHeader';
import { MalformedDataError } from './Errors';
import { FixedPoint16 } from './FixedPoint16';
import { HVCC_BOX_TYPE, HevcDecoderConfigRecord } from './HevcDecoderConfigRecord';

export const HEVC_SAMPLE_ENTRY_TYPES: readonly HevcSampleEntryType[] = ['hvc1', 'hev1'];

export function isHevcSampleEntryType(type: string): type is HevcSampleEntryType {
	return type === 'hvc1' || type === 'hev1';
}

/** Reserved bytes and data_reference_index of the generic SampleEntry. */
export const SAMPLE_ENTRY_FIELDS_SIZE = 8;
/** Fixed VisualSampleEntry fields between data_reference_index and the child boxes. */
export const VISUAL_SAMPLE_ENTRY_FIELDS_SIZE = 70;

const COMPRESSOR_NAME_SIZE = 32;
const DEFAULT_RESOLUTION = 0x48; // 72 dpi
const DEFAULT_DEPTH = 0x0018;
const PRE_DEFINED = -1;

export type HevcSampleEntryFields = {
	type: HevcSampleEntryType;
	dataReferenceIndex: number;
	width: number;
	height: number;
	horizResolution: FixedPoint16;
	vertResolution: FixedPoint16;
	frameCount: number;
	depth: number;
	config: HevcDecoderConfigRecord;
};

function assertU16(value: number, label: string) {
	if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
		throw new RangeError(`${label} must be a 16-bit unsigned integer, got ${value}`);
	}
}

/** HEVC Visual Sample Entry (hvc1 / hev1) holding exactly one hvcC box. */
export class HevcSampleEntry implements Mp4Box, HevcSampleEntryFields {
	readonly type: HevcSampleEntryType;
	readonly dataReferenceIndex: number;
	readonly width: number;
	readonly height: number;
	readonly horizResolution: FixedPoint16;
	readonly vertResolution: FixedPoint16;
	readonly frameCount: number;
	readonly depth: number;
	readonly config: HevcDecoderConfigRecord;

	constructor(fields: Partial<HevcSampleEntryFields> = {}) {
		this.type = fields.type ?? 'hvc1';
		this.dataReferenceIndex = fields.dataReferenceIndex ?? 0;
		this.width = fields.width ?? 0;
		this.height = fields.height ?? 0;
		this.horizResolution = fields.horizResolution ?? FixedPoint16.fromInteger(DEFAULT_RESOLUTION);
		this.vertResolution = fields.vertResolution ?? FixedPoint16.fromInteger(DEFAULT_RESOLUTION);
		this.frameCount = fields.frameCount ?? 1;
		this.depth = fields.depth ?? DEFAULT_DEPTH;
		this.config = fields.config ?? new HevcDecoderConfigRecord();

		assertU16(this.dataReferenceIndex, 'dataReferenceIndex');
		assertU16(this.width, 'width');
		assertU16(this.height, 'height');
		assertU16(this.frameCount, 'frameCount');
		assertU16(this.depth, 'depth');
	}

	static fromConfig(config: HevcConfig): HevcSampleEntry {
		return new HevcSampleEntry({
			type: config.type ?? 'hvc1',
			dataReferenceIndex: 1,
			width: config.width,
			height: config.height,
			config: HevcDecoderConfigRecord.fromParameterSets(config),
		});
	}

	get size(): number {
		return HEADER_SIZE + SAMPLE_ENTRY_FIELDS_SIZE + VISUAL_SAMPLE_ENTRY_FIELDS_SIZE + this.config.size;
	}

	static decode(stream: ByteStream, header: BoxHeader, opts: CodecOptions = {}): HevcSampleEntry {
		const { type } = header;
		if (!isHevcSampleEntryType(type)) {
			throw new MalformedDataError(`Expected an hvc1 or hev1 sample entry, got '${type}'`);
		}
		const start = boxStart(stream, header);

		stream.readU32(); // reserved
		stream.readU16(); // reserved
		const dataReferenceIndex = stream.readU16();

		stream.readU32(); // pre_defined, reserved
		stream.readU64(); // pre_defined
		stream.readU32(); // pre_defined
		const width = stream.readU16();
		const height = stream.readU16();
		const horizResolution = FixedPoint16.fromRaw(stream.readU32());
		const vertResolution = FixedPoint16.fromRaw(stream.readU32());
		stream.readU32(); // reserved
		const frameCount = stream.readU16();
		stream.skip(COMPRESSOR_NAME_SIZE);
		const depth = stream.readU16();
		stream.readI16(); // pre_defined

		const child = readBoxHeader(stream);
		dbg(opts, `${type}@${start}+${header.size}: ${width}x${height}, child ${child.type}+${child.size}`);
		if (child.type !== HVCC_BOX_TYPE) {
			throw new MalformedDataError(`Expected ${HVCC_BOX_TYPE} inside ${type}, found '${child.type}'`);
		}
		const config = HevcDecoderConfigRecord.decode(stream, child, opts);

		skipBytesTo(stream, start + header.size);

		return new HevcSampleEntry({
			type,
			dataReferenceIndex,
			width,
			height,
			horizResolution,
			vertResolution,
			frameCount,
			depth,
			config,
		});
	}

	encode(stream: ByteStream): number {
		const size = this.size;
		writeBoxHeader(stream, this.type, size);

		stream.writeU32(0); // reserved
		stream.writeU16(0); // reserved
		stream.writeU16(this.dataReferenceIndex);

		stream.writeU32(0); // pre_defined, reserved
		stream.writeU64(0n); // pre_defined
		stream.writeU32(0); // pre_defined
		stream.writeU16(this.width);
		stream.writeU16(this.height);
		stream.writeU32(this.horizResolution.raw);
		stream.writeU32(this.vertResolution.raw);
		stream.writeU32(0); // reserved
		stream.writeU16(this.frameCount);
		writeZeros(stream, COMPRESSOR_NAME_SIZE);
		stream.writeU16(this.depth);
		stream.writeI16(PRE_DEFINED);

		this.config.encode(stream);

		return size;
	}

	toJSON(): Record<string, unknown> {
		return {
			type: this.type,
			dataReferenceIndex: this.dataReferenceIndex,
			width: this.width,
			height: this.height,
			horizResolution: this.horizResolution.toJSON(),
			vertResolution: this.vertResolution.toJSON(),
			frameCount: this.frameCount,
			depth: this.depth,
			config: this.config.toJSON(),
		};
	}

	toJson(): string {
		return JSON.stringify(this.toJSON());
	}

	summary(): string {
		return `dataReferenceIndex=${this.dataReferenceIndex} width=${this.width} height=${this.height} frameCount=${this.frameCount}`;
	}
}
