import type { ByteStream } from '../core/ByteStream';

export type Box = {
	type: string;
	start: number;
	size: number;
	headerSize: number;
	end: number;
};

export type BoxHeader = {
	type: string;
	size: number;
	headerSize: number;
};

export type CodecOptions = {
	debug?: boolean;
};

export type HevcSampleEntryType = 'hvc1' | 'hev1';

export type ParameterSetCollections = {
	videoParameterSets?: readonly Uint8Array[];
	sequenceParameterSets?: readonly Uint8Array[];
	pictureParameterSets?: readonly Uint8Array[];
	supplementalEnhancementInformation?: readonly Uint8Array[];
};

export type HevcConfig = ParameterSetCollections & {
	width: number;
	height: number;
	type?: HevcSampleEntryType;
};

export interface Mp4Box {
	readonly type: string;
	readonly size: number;
	encode(stream: ByteStream): number;
	toJSON(): Record<string, unknown>;
	toJson(): string;
	summary(): string;
}
