import type { Box, BoxHeader } from '../types/Types';
import type { ByteStream } from './ByteStream';
import { MalformedDataError } from './Errors';

export const HEADER_SIZE = 8;
export const LARGE_HEADER_SIZE = 16;

export function readBoxHeader(stream: ByteStream): BoxHeader {
	const size32 = stream.readU32();
	const type = stream.readStr4();

	let size = size32;
	let headerSize = HEADER_SIZE;

	if (size32 === 1) {
		const size64 = stream.readU64();
		if (size64 > BigInt(Number.MAX_SAFE_INTEGER)) {
			throw new MalformedDataError(`Box ${type} too large to address safely`);
		}
		size = Number(size64);
		headerSize = LARGE_HEADER_SIZE;
	} else if (size32 === 0) {
		// Extends to the end of the stream.
		size = stream.length - (stream.position - HEADER_SIZE);
	}

	if (size < headerSize) {
		throw new MalformedDataError(`Box ${type} declares size ${size}, smaller than its ${headerSize}-byte header`);
	}

	return { type, size, headerSize };
}

/**
 * Lists the boxes laid end to end in [start, end) using readBoxHeader. Stops at the first box that does not
 * fit in the range. Leaves the stream positioned after the last header read.
 */
export function listBoxes(stream: ByteStream, start = 0, end = stream.length): Box[] {
	const boxes: Box[] = [];
	let off = start;
	while (off + HEADER_SIZE <= end) {
		stream.seek(off);
		const { type, size, headerSize } = readBoxHeader(stream);
		if (off + size > end) break;

		boxes.push({ type, start: off, size, headerSize, end: off + size });
		off += size;
	}
	return boxes;
}

export function summarizeBoxes(boxes: Box[]): string {
	return boxes.map((b) => `${b.type}@${b.start}+${b.size}`).join(' ');
}

export function writeBoxHeader(stream: ByteStream, type: string, size: number): number {
	if (size > 0xffffffff) {
		stream.writeU32(1);
		stream.writeStr4(type);
		stream.writeU64(BigInt(size));
		return LARGE_HEADER_SIZE;
	}

	stream.writeU32(size);
	stream.writeStr4(type);
	return HEADER_SIZE;
}

/** Stream offset of the first header byte of the box whose header was just read. */
export function boxStart(stream: ByteStream, header: BoxHeader): number {
	return stream.position - header.headerSize;
}

/** Moves to an absolute offset, whatever the payload decoder consumed. */
export function skipBytesTo(stream: ByteStream, pos: number) {
	stream.seek(pos);
}

export function writeZeros(stream: ByteStream, count: number): number {
	stream.writeZeros(count);
	return count;
}
