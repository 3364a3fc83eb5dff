import { describe, it, expect } from "vitest";
import { ByteStream } from "../../src/core/ByteStream";
import { boxStart, listBoxes, readBoxHeader, skipBytesTo, summarizeBoxes, writeBoxHeader } from "../../src/core/BoxHeader";
import { MalformedDataError, StreamError } from "../../src/core/Errors";
import { FixedPoint16 } from "../../src/core/FixedPoint16";
import { ascii, box, bytes, concat } from "../helpers/boxes";

describe("box header", () => {
  it("reads a compact header", () => {
    const stream = ByteStream.from(bytes(0, 0, 0, 16, ...ascii("free"), 0, 0, 0, 0, 0, 0, 0, 0));
    const header = readBoxHeader(stream);

    expect(header).toEqual({ type: "free", size: 16, headerSize: 8 });
    expect(boxStart(stream, header)).toBe(0);
  });

  it("reads a 64-bit large size", () => {
    const stream = ByteStream.from(
      bytes(0, 0, 0, 1, ...ascii("mdat"), 0, 0, 0, 0, 0, 0, 0, 24, 1, 2, 3, 4, 5, 6, 7, 8)
    );
    const header = readBoxHeader(stream);

    expect(header).toEqual({ type: "mdat", size: 24, headerSize: 16 });
    expect(boxStart(stream, header)).toBe(0);
  });

  it("treats size 0 as extending to the end of the stream", () => {
    const stream = ByteStream.from(bytes(0, 0, 0, 0, ...ascii("mdat"), 1, 2, 3, 4));
    expect(readBoxHeader(stream).size).toBe(12);
  });

  it("rejects a size smaller than the header", () => {
    const stream = ByteStream.from(bytes(0, 0, 0, 4, ...ascii("free")));
    expect(() => readBoxHeader(stream)).toThrow(MalformedDataError);
  });

  it("writes a compact header", () => {
    const stream = new ByteStream();
    expect(writeBoxHeader(stream, "hvcC", 31)).toBe(8);
    expect(Array.from(stream.bytes)).toEqual([0, 0, 0, 31, ...ascii("hvcC")]);
  });

  it("skips to an absolute offset inside the stream only", () => {
    const stream = ByteStream.from(new Uint8Array(10));
    skipBytesTo(stream, 10);
    expect(stream.position).toBe(10);
    expect(() => skipBytesTo(stream, 11)).toThrow(StreamError);
  });
});

describe("listBoxes", () => {
  it("lists boxes laid end to end within a range", () => {
    const data = concat([
      box("ftyp", bytes(1, 2, 3, 4)),
      bytes(0, 0, 0, 1, ...ascii("free"), 0, 0, 0, 0, 0, 0, 0, 16),
      box("moov", box("trak")),
    ]);
    const stream = ByteStream.from(data);

    const top = listBoxes(stream);
    expect(summarizeBoxes(top)).toBe("ftyp@0+12 free@12+16 moov@28+16");
    expect(top[1].headerSize).toBe(16);
    expect(listBoxes(stream, top[2].start + top[2].headerSize, top[2].end)).toEqual([
      { type: "trak", start: 36, size: 8, headerSize: 8, end: 44 },
    ]);
  });

  it("stops at a box that runs past the range", () => {
    const data = concat([box("free", bytes(0, 0)), bytes(0, 0, 0, 64, ...ascii("mdat"))]);
    expect(listBoxes(ByteStream.from(data)).map((b) => b.type)).toEqual(["free"]);
  });
});

describe("FixedPoint16", () => {
  it("converts between integers and raw values", () => {
    const dpi = FixedPoint16.fromInteger(72);
    expect(dpi.raw).toBe(0x00480000);
    expect(dpi.integer).toBe(72);
    expect(dpi.fraction).toBe(0);
    expect(dpi.value).toBe(72);
  });

  it("keeps fractional bits", () => {
    const half = FixedPoint16.fromNumber(1.5);
    expect(half.raw).toBe(0x00018000);
    expect(FixedPoint16.fromRaw(0x00018000).value).toBe(1.5);
  });

  it("rejects values outside 32 bits", () => {
    expect(() => FixedPoint16.fromRaw(-1)).toThrow(RangeError);
    expect(() => FixedPoint16.fromRaw(0x100000000)).toThrow(RangeError);
    expect(() => FixedPoint16.fromInteger(0x10000)).toThrow(RangeError);
  });
});
