/**
 * Tests for BIF6 binary decoding primitives
 */

import { describe, expect, it } from "vitest";
import { BadMagicError, ParseError, TruncatedHeaderError } from "../../src/errors";
import { BinaryParser, HEADER_SIZE } from "../../src/formats/bif6/binary";
import { buildHeader, buildRecord, exampleFile } from "../utils/bif6-fixtures";

describe("BinaryParser", () => {
  describe("primitive readers", () => {
    it("should read little-endian integers and floats", () => {
      const view = new DataView(new ArrayBuffer(10));
      view.setUint16(0, 0xbeef, true);
      view.setUint32(2, 0xdeadbeef, true);
      view.setFloat32(6, 1.5, true);

      expect(BinaryParser.readUInt16LE(view, 0)).toBe(0xbeef);
      expect(BinaryParser.readUInt32LE(view, 2)).toBe(0xdeadbeef);
      expect(BinaryParser.readFloat32LE(view, 6)).toBe(1.5);
    });

    it("should throw ParseError for out-of-bounds access", () => {
      const view = new DataView(new ArrayBuffer(4));

      expect(() => BinaryParser.readUInt16LE(view, 3)).toThrow(ParseError);
      expect(() => BinaryParser.readUInt32LE(view, 1)).toThrow(ParseError);
      expect(() => BinaryParser.readFloat32LE(view, 4)).toThrow(ParseError);
    });
  });

  describe("isValidBif6Magic", () => {
    it("should accept the BIF6 magic", () => {
      expect(BinaryParser.isValidBif6Magic(buildHeader(0, 1, 1))).toBe(true);
    });

    it("should reject short or different data", () => {
      expect(BinaryParser.isValidBif6Magic(new Uint8Array([0x00, 0x00, 0x42]))).toBe(false);
      expect(BinaryParser.isValidBif6Magic(new TextEncoder().encode("BIF6\0\0"))).toBe(false);
    });
  });

  describe("parseHeader", () => {
    it("should decode interval count and image size", () => {
      const header = BinaryParser.parseHeader(exampleFile().slice(0, HEADER_SIZE));

      expect(header).toEqual({ intervalCount: 2, width: 2, height: 1 });
      expect(Object.isFrozen(header)).toBe(true);
    });

    it("should read full u16 ranges", () => {
      const header = BinaryParser.parseHeader(buildHeader(65535, 640, 480));

      expect(header).toEqual({ intervalCount: 65535, width: 640, height: 480 });
    });

    it("should report a truncated header", () => {
      const bytes = buildHeader(1, 2, 2).slice(0, 11);

      try {
        BinaryParser.parseHeader(bytes);
        expect.unreachable("Should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(TruncatedHeaderError);
        expect((error as TruncatedHeaderError).expectedBytes).toBe(12);
        expect((error as TruncatedHeaderError).actualBytes).toBe(11);
      }
    });

    it("should reject a corrupted magic at every position", () => {
      for (let position = 0; position < 6; position++) {
        const bytes = buildHeader(1, 2, 2);
        bytes[position] = (bytes[position] ?? 0) ^ 0xff;

        expect(() => BinaryParser.parseHeader(bytes)).toThrow(BadMagicError);
      }
    });

    it("should describe the bytes it found", () => {
      const bytes = buildHeader(1, 2, 2, [0x00, 0x00, 0x42, 0x49, 0x46, 0x37]);

      try {
        BinaryParser.parseHeader(bytes);
        expect.unreachable("Should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(BadMagicError);
        expect((error as BadMagicError).context).toBe(
          "Expected bytes: 00 00 42 49 46 36, found: 00 00 42 49 46 37"
        );
      }
    });
  });

  describe("transposePixels", () => {
    it("should map physical row y, column x to image[x][y]", () => {
      // 3 wide, 2 high: rows [1, 2, 3] and [4, 5, 6]
      const record = buildRecord({ id: 0, mzLower: 0, mzMiddle: 0, mzUpper: 0, pixels: [1, 2, 3, 4, 5, 6] });
      const view = new DataView(record.buffer);

      const image = BinaryParser.transposePixels(view, 16, 3, 2);

      expect(image.map((column) => Array.from(column))).toEqual([
        [1, 4],
        [2, 5],
        [3, 6],
      ]);
    });

    it("should keep full u32 values", () => {
      const record = buildRecord({ id: 0, mzLower: 0, mzMiddle: 0, mzUpper: 0, pixels: [0xffffffff] });

      const image = BinaryParser.transposePixels(new DataView(record.buffer), 16, 1, 1);

      expect(image[0]?.[0]).toBe(4294967295);
    });

    it("should reject pixel data shorter than the image", () => {
      const view = new DataView(new ArrayBuffer(20));

      expect(() => BinaryParser.transposePixels(view, 16, 2, 1)).toThrow(ParseError);
    });
  });

  describe("parseIntervalRecord", () => {
    it("should decode the example record", () => {
      const record = BinaryParser.parseIntervalRecord(exampleFile().slice(HEADER_SIZE), 2, 1);

      expect(record.id).toBe(1);
      expect(record.mzLower).toBe(1.0);
      expect(record.mzMiddle).toBe(2.0);
      expect(record.mzUpper).toBe(3.0);
      expect(record.image.map((column) => Array.from(column))).toEqual([[1], [2]]);
    });

    it("should pass unordered m/z bounds through unchanged", () => {
      const bytes = buildRecord({ id: 7, mzLower: 9.5, mzMiddle: 2.25, mzUpper: -1, pixels: [] });

      const record = BinaryParser.parseIntervalRecord(bytes, 0, 0);

      expect([record.mzLower, record.mzMiddle, record.mzUpper]).toEqual([9.5, 2.25, -1]);
    });

    it("should reject records of the wrong size", () => {
      const bytes = buildRecord({ id: 1, mzLower: 1, mzMiddle: 2, mzUpper: 3, pixels: [1] });

      expect(() => BinaryParser.parseIntervalRecord(bytes, 2, 1)).toThrow(ParseError);
    });

    it("should decode records that do not start on a 4-byte boundary", () => {
      const padded = new Uint8Array(1 + 20);
      padded.set(buildRecord({ id: 3, mzLower: 1, mzMiddle: 2, mzUpper: 3, pixels: [42] }), 1);

      const record = BinaryParser.parseIntervalRecord(padded.subarray(1), 1, 1);

      expect(record.id).toBe(3);
      expect(record.image[0]?.[0]).toBe(42);
    });
  });

  describe("recordSize", () => {
    it("should add the 16-byte record header to the pixel payload", () => {
      expect(BinaryParser.recordSize(2, 2)).toBe(32);
      expect(BinaryParser.recordSize(0, 5)).toBe(16);
    });
  });
});
