import { StreamError } from './Errors';

/**
 * Seekable big-endian cursor over a growable byte buffer. Reads past the written length and seeks outside
 * [0, length] raise StreamError; writes grow the buffer and may overwrite earlier bytes after a seek.
 */
export class ByteStream {
	private buf: Uint8Array;
	private off = 0;
	private len: number;

	constructor(initialCapacity = 256) {
		this.buf = new Uint8Array(Math.max(1, initialCapacity));
		this.len = 0;
	}

	/** Wraps existing bytes for reading. The bytes are not copied. */
	static from(data: ArrayBuffer | Uint8Array): ByteStream {
		const stream = new ByteStream(0);
		stream.buf = data instanceof Uint8Array ? data : new Uint8Array(data);
		stream.len = stream.buf.byteLength;
		return stream;
	}

	get position(): number {
		return this.off;
	}

	get length(): number {
		return this.len;
	}

	get remaining(): number {
		return this.len - this.off;
	}

	/** Copy of everything written or wrapped so far. */
	get bytes(): Uint8Array {
		return this.buf.slice(0, this.len);
	}

	seek(pos: number) {
		if (!Number.isInteger(pos) || pos < 0 || pos > this.len) {
			throw new StreamError(`Cannot seek to ${pos}: stream length is ${this.len}`);
		}
		this.off = pos;
	}

	skip(count: number) {
		this.seek(this.off + count);
	}

	private require(count: number) {
		if (this.off + count > this.len) {
			throw new StreamError(
				`Unexpected end of stream: need ${count} byte(s) at offset ${this.off}, ${this.len - this.off} available`
			);
		}
	}

	readU8(): number {
		this.require(1);
		return this.buf[this.off++];
	}

	readU16(): number {
		this.require(2);
		const v = (this.buf[this.off] << 8) | this.buf[this.off + 1];
		this.off += 2;
		return v;
	}

	readI16(): number {
		const v = this.readU16();
		return v & 0x8000 ? v - 0x10000 : v;
	}

	readU32(): number {
		this.require(4);
		const b = this.buf;
		const o = this.off;
		this.off += 4;
		return ((b[o] << 24) | (b[o + 1] << 16) | (b[o + 2] << 8) | b[o + 3]) >>> 0;
	}

	readU64(): bigint {
		const hi = BigInt(this.readU32());
		const lo = BigInt(this.readU32());
		return (hi << 32n) | lo;
	}

	readStr4(): string {
		this.require(4);
		const b = this.buf;
		const o = this.off;
		this.off += 4;
		return String.fromCharCode(b[o], b[o + 1], b[o + 2], b[o + 3]);
	}

	readBytes(count: number): Uint8Array {
		this.require(count);
		const out = this.buf.slice(this.off, this.off + count);
		this.off += count;
		return out;
	}

	private ensureSize(size: number) {
		if (size <= this.buf.byteLength) return;

		let newLength = Math.max(1, this.buf.byteLength);
		while (newLength < size) newLength *= 2;

		const next = new Uint8Array(newLength);
		next.set(this.buf.subarray(0, this.len), 0);
		this.buf = next;
	}

	private advance(count: number) {
		this.off += count;
		if (this.off > this.len) this.len = this.off;
	}

	writeU8(v: number) {
		this.ensureSize(this.off + 1);
		this.buf[this.off] = v & 0xff;
		this.advance(1);
	}

	writeU16(v: number) {
		this.ensureSize(this.off + 2);
		this.buf[this.off] = (v >>> 8) & 0xff;
		this.buf[this.off + 1] = v & 0xff;
		this.advance(2);
	}

	writeI16(v: number) {
		this.writeU16(v & 0xffff);
	}

	writeU32(v: number) {
		this.ensureSize(this.off + 4);
		this.buf[this.off] = (v >>> 24) & 0xff;
		this.buf[this.off + 1] = (v >>> 16) & 0xff;
		this.buf[this.off + 2] = (v >>> 8) & 0xff;
		this.buf[this.off + 3] = v & 0xff;
		this.advance(4);
	}

	writeU64(v: bigint) {
		this.writeU32(Number((v >> 32n) & 0xffffffffn));
		this.writeU32(Number(v & 0xffffffffn));
	}

	writeStr4(s: string) {
		if (s.length !== 4) throw new RangeError(`Box type must be 4 characters, got '${s}'`);
		for (let i = 0; i < 4; i++) this.writeU8(s.charCodeAt(i));
	}

	writeBytes(b: Uint8Array) {
		this.ensureSize(this.off + b.byteLength);
		this.buf.set(b, this.off);
		this.advance(b.byteLength);
	}

	writeZeros(count: number) {
		this.ensureSize(this.off + count);
		this.buf.fill(0, this.off, this.off + count);
		this.advance(count);
	}
}
