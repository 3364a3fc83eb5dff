import { describe, it, expect } from "vitest";
import { ByteStream } from "../../src/core/ByteStream";
import { StreamError } from "../../src/core/Errors";
import { MAX_NAL_UNIT_LENGTH, NalUnit } from "../../src/core/NalUnit";
import { bytes } from "../helpers/boxes";

describe("NalUnit", () => {
  it("counts the length prefix in its size", () => {
    expect(new NalUnit(bytes(1, 2, 3)).size).toBe(5);
    expect(new NalUnit(new Uint8Array(0)).size).toBe(2);
  });

  it("encodes a 16-bit length then the raw bytes", () => {
    const stream = new ByteStream();
    expect(new NalUnit(bytes(0xaa, 0xbb)).encode(stream)).toBe(4);
    expect(Array.from(stream.bytes)).toEqual([0x00, 0x02, 0xaa, 0xbb]);
  });

  it("decodes exactly the declared number of bytes", () => {
    const stream = ByteStream.from(bytes(0x00, 0x02, 0xaa, 0xbb, 0xcc));
    const unit = NalUnit.decode(stream);

    expect(Array.from(unit.bytes)).toEqual([0xaa, 0xbb]);
    expect(stream.position).toBe(4);
  });

  it("raises StreamError instead of truncating on a short read", () => {
    const stream = ByteStream.from(bytes(0x00, 0x05, 1, 2));
    expect(() => NalUnit.decode(stream)).toThrow(StreamError);
  });

  it("accepts the largest length and rejects anything longer", () => {
    expect(new NalUnit(new Uint8Array(MAX_NAL_UNIT_LENGTH)).size).toBe(65537);
    expect(() => new NalUnit(new Uint8Array(MAX_NAL_UNIT_LENGTH + 1))).toThrow(RangeError);
  });

  it("keeps its own copy of the bytes it was built from", () => {
    const source = bytes(1, 2, 3);
    const unit = new NalUnit(source);
    source[0] = 9;
    expect(Array.from(unit.bytes)).toEqual([1, 2, 3]);
  });

  it("dumps its bytes as numbers", () => {
    expect(new NalUnit(bytes(0x40, 0x01)).toJSON()).toEqual({ bytes: [0x40, 0x01] });
  });
});
