import type { ByteStream } from './ByteStream';

export const MAX_NAL_UNIT_LENGTH = 0xffff;

/** An opaque NAL unit carried with a 16-bit length prefix. Holds its own copy of the bytes. */
export class NalUnit {
	readonly bytes: Uint8Array;

	constructor(bytes: Uint8Array) {
		if (bytes.byteLength > MAX_NAL_UNIT_LENGTH) {
			throw new RangeError(`NAL unit of ${bytes.byteLength} bytes exceeds ${MAX_NAL_UNIT_LENGTH}`);
		}
		this.bytes = bytes.slice();
	}

	get size(): number {
		return 2 + this.bytes.byteLength;
	}

	static decode(stream: ByteStream): NalUnit {
		const length = stream.readU16();
		return new NalUnit(stream.readBytes(length));
	}

	encode(stream: ByteStream): number {
		stream.writeU16(this.bytes.byteLength);
		stream.writeBytes(this.bytes);
		return this.size;
	}

	toJSON(): { bytes: number[] } {
		return { bytes: Array.from(this.bytes) };
	}
}
