import { describe, it, expect } from "vitest";
import { InitSegmentParser } from "../../src/core/InitSegmentParser";
import { encodeHevcSampleEntry, findHevcSampleEntries } from "../../src/core/index";
import { ascii, box, bytes, concat } from "../helpers/boxes";

function tkhd(trackId: number): Uint8Array {
  // version 0, flags 3, creation, modification, track id, then the rest of the header zeroed
  return box("tkhd", bytes(0, 0, 0, 3), new Uint8Array(8), bytes(0, 0, 0, trackId), new Uint8Array(68));
}

function trak(trackId: number, ...sampleEntries: Uint8Array[]): Uint8Array {
  const stsd = box("stsd", bytes(0, 0, 0, 0, 0, 0, 0, sampleEntries.length), ...sampleEntries);
  return box("trak", tkhd(trackId), box("mdia", box("minf", box("stbl", stsd))));
}

const FTYP = box("ftyp", bytes(...ascii("isom"), 0, 0, 2, 0));

describe("InitSegmentParser", () => {
  it("finds HEVC sample entries inside stsd", () => {
    const hvc1 = encodeHevcSampleEntry({
      width: 1280,
      height: 720,
      sequenceParameterSets: [bytes(0x42, 0x01, 0x01)],
      pictureParameterSets: [bytes(0x44, 0x01)],
    });
    const avc1 = box("avc1", new Uint8Array(10));
    const init = concat([FTYP, box("moov", trak(7, avc1, hvc1))]);

    const located = new InitSegmentParser().parse(init);

    expect(located).toHaveLength(1);
    expect(located[0].trackId).toBe(7);
    expect(located[0].offset).toBe(init.byteLength - hvc1.byteLength);
    expect(located[0].entry.width).toBe(1280);
    expect(located[0].entry.config.pictureParameterSets.map((u) => Array.from(u.bytes))).toEqual([[0x44, 0x01]]);
  });

  it("reports entries from every track", () => {
    const a = encodeHevcSampleEntry({ width: 640, height: 360 });
    const b = encodeHevcSampleEntry({ type: "hev1", width: 320, height: 180 });
    const init = concat([FTYP, box("moov", trak(1, a), trak(2, b))]);

    const located = findHevcSampleEntries(init);

    expect(located.map((l) => [l.trackId, l.entry.type, l.entry.width])).toEqual([
      [1, "hvc1", 640],
      [2, "hev1", 320],
    ]);
  });

  it("decodes a sample entry stored on its own", () => {
    const hvc1 = encodeHevcSampleEntry({ width: 1920, height: 1080 });
    const located = findHevcSampleEntries(hvc1);

    expect(located).toHaveLength(1);
    expect(located[0].trackId).toBeNull();
    expect(located[0].offset).toBe(0);
    expect(located[0].entry.height).toBe(1080);
  });

  it("returns nothing when no track carries HEVC", () => {
    const init = concat([FTYP, box("moov", trak(1, box("avc1", new Uint8Array(10))))]);
    expect(findHevcSampleEntries(init)).toEqual([]);
  });
});
