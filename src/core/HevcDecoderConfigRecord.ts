import type { BoxHeader, CodecOptions, Mp4Box, ParameterSetCollections } from '../types/Types';
import { dbg } from '../utils/debug';
import type { ByteStream } from './ByteStream';
import { HEADER_SIZE, boxStart, skipBytesTo, writeBoxHeader } from './BoxHeader';
import { MalformedDataError } from './Errors';
import { NalUnit } from './NalUnit';

export const HVCC_BOX_TYPE = 'hvcC';

export const NAL_UNIT_ROLE = {
	VPS: 32,
	SPS: 33,
	PPS: 34,
	SEI: 39,
} as const;

export type NalUnitRoleId = (typeof NAL_UNIT_ROLE)[keyof typeof NAL_UNIT_ROLE];

type NalUnitArrayKey =
	| 'videoParameterSets'
	| 'sequenceParameterSets'
	| 'pictureParameterSets'
	| 'supplementalEnhancementInformation';

// Wire order of the NAL unit arrays.
const NAL_UNIT_ARRAYS: ReadonlyArray<{ role: NalUnitRoleId; key: NalUnitArrayKey }> = [
	{ role: NAL_UNIT_ROLE.VPS, key: 'videoParameterSets' },
	{ role: NAL_UNIT_ROLE.SPS, key: 'sequenceParameterSets' },
	{ role: NAL_UNIT_ROLE.PPS, key: 'pictureParameterSets' },
	{ role: NAL_UNIT_ROLE.SEI, key: 'supplementalEnhancementInformation' },
];

export const GENERAL_CONFIGURATION_SIZE = 12;
export const MAX_TOTAL_NAL_UNITS = 0xff;

/** Bytes between the box header and the first NAL unit array. */
export const FIXED_FIELDS_SIZE = 23;

const CONFIGURATION_VERSION = 0x01;
// reserved '1111' + min_spatial_segmentation_idc 0
const MIN_SPATIAL_SEGMENTATION = 0xf000;
// reserved '111111' + parallelismType 0
const PARALLELISM_TYPE = 0xfc;
const AVG_FRAME_RATE = 0x0000;

/**
 * A field sharing a byte with reserved bits. Reserved bits are always written as `reserved` and ignored on
 * read; the value occupies `mask << shift`.
 */
type PackedField = { mask: number; shift: number; reserved: number };

const CHROMA_FORMAT: PackedField = { mask: 0x03, shift: 0, reserved: 0xfc };
const BIT_DEPTH: PackedField = { mask: 0x07, shift: 0, reserved: 0xf8 };
// constantFrameRate 0, lengthSizeMinusOne 3 fill the bits around the two temporal fields
const NUM_TEMPORAL_LAYERS: PackedField = { mask: 0x07, shift: 3, reserved: 0x03 };
const TEMPORAL_ID_NESTED: PackedField = { mask: 0x01, shift: 2, reserved: 0x00 };

function pack(field: PackedField, value: number): number {
	return field.reserved | ((value & field.mask) << field.shift);
}

function unpack(field: PackedField, byte: number): number {
	return (byte >> field.shift) & field.mask;
}

function assertFits(field: PackedField, value: number, label: string) {
	if (!Number.isInteger(value) || value < 0 || value > field.mask) {
		throw new RangeError(`${label} must be an integer in [0, ${field.mask}], got ${value}`);
	}
}

export type HevcDecoderConfigFields = {
	generalConfiguration: Uint8Array;
	numTemporalLayers: number;
	chromaIdc: number;
	bitDepthLumaMinus8: number;
	bitDepthChromaMinus8: number;
	temporalIdNested: boolean;
	videoParameterSets: readonly NalUnit[];
	sequenceParameterSets: readonly NalUnit[];
	pictureParameterSets: readonly NalUnit[];
	supplementalEnhancementInformation: readonly NalUnit[];
};

/** HEVC Configuration Box (hvcC): wraps an HEVCDecoderConfigurationRecord. */
export class HevcDecoderConfigRecord implements Mp4Box, HevcDecoderConfigFields {
	readonly type = HVCC_BOX_TYPE;
	readonly generalConfiguration: Uint8Array;
	readonly numTemporalLayers: number;
	readonly chromaIdc: number;
	readonly bitDepthLumaMinus8: number;
	readonly bitDepthChromaMinus8: number;
	readonly temporalIdNested: boolean;
	readonly videoParameterSets: readonly NalUnit[];
	readonly sequenceParameterSets: readonly NalUnit[];
	readonly pictureParameterSets: readonly NalUnit[];
	readonly supplementalEnhancementInformation: readonly NalUnit[];

	constructor(fields: Partial<HevcDecoderConfigFields> = {}) {
		const generalConfiguration = fields.generalConfiguration ?? new Uint8Array(GENERAL_CONFIGURATION_SIZE);
		if (generalConfiguration.byteLength !== GENERAL_CONFIGURATION_SIZE) {
			throw new RangeError(
				`generalConfiguration must be ${GENERAL_CONFIGURATION_SIZE} bytes, got ${generalConfiguration.byteLength}`
			);
		}

		this.generalConfiguration = generalConfiguration.slice();
		this.numTemporalLayers = fields.numTemporalLayers ?? 0;
		this.chromaIdc = fields.chromaIdc ?? 0;
		this.bitDepthLumaMinus8 = fields.bitDepthLumaMinus8 ?? 0;
		this.bitDepthChromaMinus8 = fields.bitDepthChromaMinus8 ?? 0;
		this.temporalIdNested = fields.temporalIdNested ?? false;
		this.videoParameterSets = [...(fields.videoParameterSets ?? [])];
		this.sequenceParameterSets = [...(fields.sequenceParameterSets ?? [])];
		this.pictureParameterSets = [...(fields.pictureParameterSets ?? [])];
		this.supplementalEnhancementInformation = [...(fields.supplementalEnhancementInformation ?? [])];

		assertFits(NUM_TEMPORAL_LAYERS, this.numTemporalLayers, 'numTemporalLayers');
		assertFits(CHROMA_FORMAT, this.chromaIdc, 'chromaIdc');
		assertFits(BIT_DEPTH, this.bitDepthLumaMinus8, 'bitDepthLumaMinus8');
		assertFits(BIT_DEPTH, this.bitDepthChromaMinus8, 'bitDepthChromaMinus8');

		if (this.totalNalUnits > MAX_TOTAL_NAL_UNITS) {
			throw new RangeError(`At most ${MAX_TOTAL_NAL_UNITS} NAL units fit in hvcC, got ${this.totalNalUnits}`);
		}
	}

	/** Wraps each raw parameter set, keeping input order within each role. */
	static fromParameterSets(sets: ParameterSetCollections): HevcDecoderConfigRecord {
		const wrap = (list: readonly Uint8Array[] | undefined) => (list ?? []).map((b) => new NalUnit(b));
		return new HevcDecoderConfigRecord({
			videoParameterSets: wrap(sets.videoParameterSets),
			sequenceParameterSets: wrap(sets.sequenceParameterSets),
			pictureParameterSets: wrap(sets.pictureParameterSets),
			supplementalEnhancementInformation: wrap(sets.supplementalEnhancementInformation),
		});
	}

	get totalNalUnits(): number {
		return NAL_UNIT_ARRAYS.reduce((sum, a) => sum + this[a.key].length, 0);
	}

	/** Size of the record without its box header. */
	get contentSize(): number {
		let size = FIXED_FIELDS_SIZE;
		for (const { key } of NAL_UNIT_ARRAYS) {
			const units = this[key];
			if (!units.length) continue;
			size += 3;
			for (const unit of units) size += unit.size;
		}
		return size;
	}

	get size(): number {
		return HEADER_SIZE + this.contentSize;
	}

	static decode(stream: ByteStream, header: BoxHeader, opts: CodecOptions = {}): HevcDecoderConfigRecord {
		const start = boxStart(stream, header);

		stream.readU8(); // configurationVersion
		const generalConfiguration = stream.readBytes(GENERAL_CONFIGURATION_SIZE);
		stream.readU16(); // min_spatial_segmentation_idc
		stream.readU8(); // parallelismType
		const chromaIdc = unpack(CHROMA_FORMAT, stream.readU8());
		const bitDepthLumaMinus8 = unpack(BIT_DEPTH, stream.readU8());
		const bitDepthChromaMinus8 = unpack(BIT_DEPTH, stream.readU8());
		stream.readU16(); // avgFrameRate
		const temporal = stream.readU8();
		const numTemporalLayers = unpack(NUM_TEMPORAL_LAYERS, temporal);
		const temporalIdNested = unpack(TEMPORAL_ID_NESTED, temporal) === 1;
		const numNalUnits = stream.readU8();

		const arrays = new Map<number, NalUnit[]>(NAL_UNIT_ARRAYS.map((a) => [a.role, []]));

		// Unknown roles are read and dropped so the cursor stays aligned.
		let consumed = 0;
		while (consumed < numNalUnits) {
			const role = stream.readU8();
			const count = stream.readU16();
			if (consumed + count > MAX_TOTAL_NAL_UNITS) {
				throw new MalformedDataError(
					`hvcC array of role ${role} brings the NAL unit count to ${consumed + count}, more than ${MAX_TOTAL_NAL_UNITS}`
				);
			}
			const target = arrays.get(role);
			if (!target) {
				dbg(opts, `hvcC: dropping ${count} NAL unit(s) with unknown role ${role}`);
			}
			for (let i = 0; i < count; i++) {
				const unit = NalUnit.decode(stream);
				target?.push(unit);
				consumed++;
			}
		}

		dbg(opts, `hvcC@${start}+${header.size}: ${consumed}/${numNalUnits} NAL units`);
		skipBytesTo(stream, start + header.size);

		return new HevcDecoderConfigRecord({
			generalConfiguration,
			numTemporalLayers,
			chromaIdc,
			bitDepthLumaMinus8,
			bitDepthChromaMinus8,
			temporalIdNested,
			videoParameterSets: arrays.get(NAL_UNIT_ROLE.VPS),
			sequenceParameterSets: arrays.get(NAL_UNIT_ROLE.SPS),
			pictureParameterSets: arrays.get(NAL_UNIT_ROLE.PPS),
			supplementalEnhancementInformation: arrays.get(NAL_UNIT_ROLE.SEI),
		});
	}

	encode(stream: ByteStream): number {
		const size = this.size;
		writeBoxHeader(stream, this.type, size);

		stream.writeU8(CONFIGURATION_VERSION);
		stream.writeBytes(this.generalConfiguration);
		stream.writeU16(MIN_SPATIAL_SEGMENTATION);
		stream.writeU8(PARALLELISM_TYPE);
		stream.writeU8(pack(CHROMA_FORMAT, this.chromaIdc));
		stream.writeU8(pack(BIT_DEPTH, this.bitDepthLumaMinus8));
		stream.writeU8(pack(BIT_DEPTH, this.bitDepthChromaMinus8));
		stream.writeU16(AVG_FRAME_RATE);
		stream.writeU8(
			pack(NUM_TEMPORAL_LAYERS, this.numTemporalLayers) | pack(TEMPORAL_ID_NESTED, this.temporalIdNested ? 1 : 0)
		);
		stream.writeU8(this.totalNalUnits);

		for (const { role, key } of NAL_UNIT_ARRAYS) {
			const units = this[key];
			if (!units.length) continue;
			stream.writeU8(role);
			stream.writeU16(units.length);
			for (const unit of units) unit.encode(stream);
		}

		return size;
	}

	toJSON(): Record<string, unknown> {
		return {
			generalConfiguration: Array.from(this.generalConfiguration),
			numTemporalLayers: this.numTemporalLayers,
			chromaIdc: this.chromaIdc,
			bitDepthLumaMinus8: this.bitDepthLumaMinus8,
			bitDepthChromaMinus8: this.bitDepthChromaMinus8,
			temporalIdNested: this.temporalIdNested,
			videoParameterSets: this.videoParameterSets.map((u) => u.toJSON()),
			sequenceParameterSets: this.sequenceParameterSets.map((u) => u.toJSON()),
			pictureParameterSets: this.pictureParameterSets.map((u) => u.toJSON()),
			supplementalEnhancementInformation: this.supplementalEnhancementInformation.map((u) => u.toJSON()),
		};
	}

	toJson(): string {
		return JSON.stringify(this.toJSON());
	}

	summary(): string {
		return `chromaIdc=${this.chromaIdc}`;
	}
}
