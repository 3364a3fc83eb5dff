import { ByteStream } from "../../src/core/ByteStream";
import { readBoxHeader } from "../../src/core/BoxHeader";
import { HevcDecoderConfigRecord } from "../../src/core/HevcDecoderConfigRecord";

export function concat(chunks: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(chunks.reduce((sum, c) => sum + c.byteLength, 0));
  let off = 0;
  for (const c of chunks) {
    out.set(c, off);
    off += c.byteLength;
  }
  return out;
}

export function box(type: string, ...payloads: Uint8Array[]): Uint8Array {
  const content = concat(payloads);
  const stream = new ByteStream(8 + content.byteLength);
  stream.writeU32(8 + content.byteLength);
  stream.writeStr4(type);
  stream.writeBytes(content);
  return stream.bytes;
}

export function bytes(...values: number[]): Uint8Array {
  return new Uint8Array(values);
}

export function filled(length: number, seed: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (seed + i) & 0xff);
}

export function ascii(s: string): number[] {
  return Array.from(s, (c) => c.charCodeAt(0));
}

export function encodeRecord(record: HevcDecoderConfigRecord): Uint8Array {
  const stream = new ByteStream();
  record.encode(stream);
  return stream.bytes;
}

export function decodeRecord(data: Uint8Array): { record: HevcDecoderConfigRecord; stream: ByteStream } {
  const stream = ByteStream.from(data);
  const header = readBoxHeader(stream);
  return { record: HevcDecoderConfigRecord.decode(stream, header), stream };
}

/** Rewrites the 32-bit size field of the box starting at `offset`. */
export function setBoxSize(data: Uint8Array, offset: number, size: number) {
  data[offset] = (size >>> 24) & 0xff;
  data[offset + 1] = (size >>> 16) & 0xff;
  data[offset + 2] = (size >>> 8) & 0xff;
  data[offset + 3] = size & 0xff;
}
