import { describe, expect, it } from "vitest";
import {
  encodeFileUniqueId,
  FileUniqueType,
  mediaUniqueId,
  rleEncode,
} from "./file-unique-id";

describe("rleEncode", () => {
  it("collapses runs of zero bytes into a zero and a count", () => {
    expect([...rleEncode(Uint8Array.from([1, 0, 0, 0, 2]))]).toEqual([1, 0, 3, 2]);
    expect([...rleEncode(Uint8Array.from([0, 0]))]).toEqual([0, 2]);
  });

  it("leaves data without zeros untouched", () => {
    expect([...rleEncode(Uint8Array.from([7, 8, 9]))]).toEqual([7, 8, 9]);
  });
});

describe("mediaUniqueId", () => {
  it("encodes the document type and media id", () => {
    expect(mediaUniqueId(0n)).toBe("AgAL");
    expect(mediaUniqueId(1n)).toBe("AgADAQAH");
  });

  it("treats ids above the signed range as their two's complement", () => {
    expect(mediaUniqueId(2n ** 64n - 1n)).toBe(mediaUniqueId(-1n));
  });

  it("is the document encoding", () => {
    expect(mediaUniqueId(123456789n)).toBe(
      encodeFileUniqueId(FileUniqueType.Document, 123456789n),
    );
    expect(encodeFileUniqueId(FileUniqueType.Photo, 1n)).not.toBe(
      mediaUniqueId(1n),
    );
  });
});
