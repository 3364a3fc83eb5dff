import type { Box, CodecOptions } from '../types/Types';
import { dbg } from '../utils/debug';
import { listBoxes, summarizeBoxes } from './BoxHeader';
import { ByteStream } from './ByteStream';
import { HevcSampleEntry, isHevcSampleEntryType } from './HevcSampleEntry';

export type LocatedSampleEntry = {
	trackId: number | null;
	offset: number;
	entry: HevcSampleEntry;
};

// stsd is a FullBox (version + flags) followed by a u32 entry count
const STSD_PREAMBLE_SIZE = 8;

export class InitSegmentParser {
	private readonly opts: CodecOptions;

	constructor(opts: CodecOptions = {}) {
		this.opts = opts;
	}

	/**
	 * Decodes every HEVC sample entry found in `moov/trak/.../stsd`, plus any sample entry box stored at the
	 * top level on its own.
	 */
	parse(init: ArrayBuffer | Uint8Array): LocatedSampleEntry[] {
		const stream = ByteStream.from(init);
		const out: LocatedSampleEntry[] = [];
		const top = listBoxes(stream);
		dbg(this.opts, 'top-level boxes:', summarizeBoxes(top));

		for (const box of top) {
			if (isHevcSampleEntryType(box.type)) {
				out.push({ trackId: null, offset: box.start, entry: this.decodeEntry(stream, box) });
				continue;
			}
			if (box.type !== 'moov') continue;

			for (const trak of this.children(stream, box).filter((b) => b.type === 'trak')) {
				const trackId = this.tkhdTrackId(stream, trak);
				const stsd = this.findPath(stream, trak, ['mdia', 'minf', 'stbl', 'stsd']);
				if (!stsd) continue;

				const entriesStart = stsd.start + stsd.headerSize + STSD_PREAMBLE_SIZE;
				if (entriesStart > stsd.end) continue;

				for (const entry of listBoxes(stream, entriesStart, stsd.end)) {
					dbg(this.opts, `track ${trackId ?? '?'} sample entry ${entry.type}@${entry.start}+${entry.size}`);
					if (!isHevcSampleEntryType(entry.type)) continue;
					out.push({ trackId, offset: entry.start, entry: this.decodeEntry(stream, entry) });
				}
			}
		}

		return out;
	}

	private decodeEntry(stream: ByteStream, box: Box): HevcSampleEntry {
		stream.seek(box.start + box.headerSize);
		return HevcSampleEntry.decode(stream, box, this.opts);
	}

	private children(stream: ByteStream, parent: Box): Box[] {
		return listBoxes(stream, parent.start + parent.headerSize, parent.end);
	}

	private findPath(stream: ByteStream, parent: Box, path: string[]): Box | undefined {
		let current: Box | undefined = parent;
		for (const type of path) {
			if (!current) return undefined;
			current = this.children(stream, current).find((b) => b.type === type);
		}
		return current;
	}

	private tkhdTrackId(stream: ByteStream, trak: Box): number | null {
		const tkhd = this.children(stream, trak).find((b) => b.type === 'tkhd');
		if (!tkhd) return null;

		const contentStart = tkhd.start + tkhd.headerSize;
		if (contentStart + 4 > tkhd.end) return null;

		stream.seek(contentStart);
		const version = stream.readU8();
		// creation and modification times precede track_ID: 32-bit in version 0, 64-bit in version 1
		let timesSize: number;
		if (version === 0) timesSize = 8;
		else if (version === 1) timesSize = 16;
		else return null;

		const trackIdAt = contentStart + 4 + timesSize;
		if (trackIdAt + 4 > tkhd.end) return null;

		stream.seek(trackIdAt);
		return stream.readU32();
	}
}

export default InitSegmentParser;
