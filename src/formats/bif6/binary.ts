/**
 * Binary data parsing utilities for BIF6 format
 *
 * File layout, all little-endian:
 * - Header (12 bytes): magic `00 00 'B' 'I' 'F' '6'`, interval count (u16),
 *   width (u16), height (u16)
 * - Interval records, back to back: id (u32), m/z lower, middle and upper
 *   (f32 each), then `width * height` u32 pixels stored row-major
 *   (`height` rows of `width` pixels)
 */

import { BadMagicError, ParseError, TruncatedHeaderError } from "../../errors";
import type { Bif6Header, Bif6IntervalRecord, IntervalImage } from "../../types";

// Module-level constants for the BIF6 layout
export const BIF6_MAGIC = new Uint8Array([0x00, 0x00, 0x42, 0x49, 0x46, 0x36]); // "\0\0BIF6"
export const HEADER_SIZE = 12;
export const RECORD_HEADER_SIZE = 16;
export const BYTES_PER_PIXEL = 4;

/**
 * Read a 16-bit unsigned integer in little-endian format
 * @throws {ParseError} If offset is out of bounds
 */
export function readUInt16LE(view: DataView, offset: number): number {
  if (offset + 2 > view.byteLength) {
    throw new ParseError(
      `Cannot read uint16 at offset ${offset}: buffer too small (${view.byteLength} bytes)`,
      "BIF6",
      offset
    );
  }

  return view.getUint16(offset, true); // true = little-endian
}

/**
 * Read a 32-bit unsigned integer in little-endian format
 * @throws {ParseError} If offset is out of bounds
 */
export function readUInt32LE(view: DataView, offset: number): number {
  if (offset + 4 > view.byteLength) {
    throw new ParseError(
      `Cannot read uint32 at offset ${offset}: buffer too small (${view.byteLength} bytes)`,
      "BIF6",
      offset
    );
  }

  return view.getUint32(offset, true);
}

/**
 * Read an IEEE-754 single-precision float in little-endian format
 * @throws {ParseError} If offset is out of bounds
 */
export function readFloat32LE(view: DataView, offset: number): number {
  if (offset + 4 > view.byteLength) {
    throw new ParseError(
      `Cannot read float32 at offset ${offset}: buffer too small (${view.byteLength} bytes)`,
      "BIF6",
      offset
    );
  }

  return view.getFloat32(offset, true);
}

/**
 * Validate BIF6 magic bytes
 * @param magicBytes At least the first six bytes of a file
 */
export function isValidBif6Magic(magicBytes: Uint8Array): boolean {
  if (magicBytes.length < BIF6_MAGIC.length) {
    return false;
  }

  for (let i = 0; i < BIF6_MAGIC.length; i++) {
    if (magicBytes[i] !== BIF6_MAGIC[i]) {
      return false;
    }
  }

  return true;
}

/**
 * Size in bytes of one interval record for the given image dimensions
 */
export function recordSize(width: number, height: number): number {
  return RECORD_HEADER_SIZE + width * height * BYTES_PER_PIXEL;
}

/**
 * Parse the fixed file header
 * @param bytes The first {@link HEADER_SIZE} bytes of the file (or fewer, if that is all there is)
 * @throws {TruncatedHeaderError} If fewer than {@link HEADER_SIZE} bytes are given
 * @throws {BadMagicError} If the magic does not match
 */
export function parseHeader(bytes: Uint8Array): Bif6Header {
  if (bytes.length < HEADER_SIZE) {
    throw new TruncatedHeaderError(HEADER_SIZE, bytes.length);
  }
  if (!isValidBif6Magic(bytes)) {
    throw new BadMagicError(bytes.slice(0, BIF6_MAGIC.length));
  }

  const view = createView(bytes);
  return Object.freeze({
    intervalCount: readUInt16LE(view, 6),
    width: readUInt16LE(view, 8),
    height: readUInt16LE(view, 10),
  });
}

/**
 * Decode row-major pixel data into `width` columns of `height` pixels
 *
 * The pixel at physical index `y * width + x` lands at `image[x][y]`.
 *
 * @param view DataView over the record
 * @param offset Byte offset of the first pixel
 */
export function transposePixels(
  view: DataView,
  offset: number,
  width: number,
  height: number
): IntervalImage {
  const needed = offset + width * height * BYTES_PER_PIXEL;
  if (needed > view.byteLength) {
    throw new ParseError(
      `Pixel data needs ${needed - offset} bytes at offset ${offset}, buffer has ${view.byteLength - offset}`,
      "BIF6",
      offset
    );
  }

  const columns: Uint32Array[] = [];
  for (let x = 0; x < width; x++) {
    columns.push(new Uint32Array(height));
  }

  let position = offset;
  for (let y = 0; y < height; y++) {
    for (const column of columns) {
      column[y] = view.getUint32(position, true);
      position += BYTES_PER_PIXEL;
    }
  }

  return Object.freeze(columns);
}

/**
 * Parse one complete interval record
 * @param bytes Exactly {@link recordSize} bytes
 * @throws {ParseError} If the record is not exactly the expected size
 */
export function parseIntervalRecord(
  bytes: Uint8Array,
  width: number,
  height: number
): Bif6IntervalRecord {
  const expected = recordSize(width, height);
  if (bytes.length !== expected) {
    throw new ParseError(
      `Interval record must be ${expected} bytes, got ${bytes.length}`,
      "BIF6"
    );
  }

  const view = createView(bytes);
  return {
    id: readUInt32LE(view, 0),
    mzLower: readFloat32LE(view, 4),
    mzMiddle: readFloat32LE(view, 8),
    mzUpper: readFloat32LE(view, 12),
    image: transposePixels(view, RECORD_HEADER_SIZE, width, height),
  };
}

function createView(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Consolidated binary helpers
 */
export const BinaryParser = {
  readUInt16LE,
  readUInt32LE,
  readFloat32LE,
  isValidBif6Magic,
  recordSize,
  parseHeader,
  transposePixels,
  parseIntervalRecord,
} as const;
