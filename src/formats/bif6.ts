/**
 * BIF6 format parser for mass-spectrometry imaging data
 *
 * A BIF6 file holds a header followed by interval records, each pairing an
 * m/z range with a 2D image of u32 intensities. Images are stored row-major
 * and returned transposed, indexed `image[x][y]`.
 */

import { FileError, ValidationError } from "../errors";
import { exists } from "../io/file-reader";
import type {
  Bif6Header,
  Bif6ParserOptions,
  Bif6Source,
  FileReaderOptions,
  ImageStatistics,
} from "../types";
import { AbstractParser } from "./abstract-parser";
import { HEADER_SIZE, isValidBif6Magic, recordSize } from "./bif6/binary";
import type { Bif6Interval } from "./bif6/interval";
import { Bif6Session } from "./bif6/session";

/**
 * Streaming BIF6 parser
 *
 * Each `parse*` method opens a session, yields its intervals and closes it
 * when iteration ends, fails or is abandoned.
 *
 * @example Basic usage
 * ```typescript
 * const parser = new Bif6Parser();
 * for await (const interval of parser.parseFile('sample.bif6')) {
 *   console.log(`#${interval.id} m/z ${interval.mzLower}-${interval.mzUpper}`);
 * }
 * ```
 *
 * @example With custom options
 * ```typescript
 * const parser = new Bif6Parser({
 *   signal: controller.signal,
 *   onWarning: (warning) => logger.warn(warning),
 * });
 * ```
 */
export class Bif6Parser extends AbstractParser<Bif6Interval, Bif6ParserOptions> {
  constructor(options: Bif6ParserOptions = {}) {
    super(options);
  }

  protected getDefaultOptions(): Partial<Bif6ParserOptions> {
    return {
      warnOnCountMismatch: true,
    };
  }

  protected getFormatName(): string {
    return "BIF6";
  }

  /**
   * Open a session with this parser's options
   */
  async open(source: Bif6Source): Promise<Bif6Session> {
    this.throwIfAborted("session open");
    return Bif6Session.open(source, this.options);
  }

  /**
   * Parse intervals from a file
   * @throws {ValidationError} If the path is empty
   * @throws {FileError} If the path names no readable file
   */
  async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<Bif6Interval> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }
    if (!(await exists(filePath))) {
      throw new FileError(
        `BIF6 file not found or not accessible: ${filePath}`,
        filePath,
        "open",
        undefined,
        "Please check that the file exists and you have read permissions"
      );
    }

    this.throwIfAborted("session open");
    const sessionOptions =
      options === undefined ? this.options : { ...this.options, fileOptions: options };
    yield* await Bif6Session.open(filePath, sessionOptions);
  }

  /**
   * Parse intervals from a binary stream
   */
  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<Bif6Interval> {
    if (!(stream instanceof ReadableStream)) {
      throw new ValidationError("stream must be a ReadableStream");
    }

    yield* await this.open(stream);
  }

  /**
   * Parse intervals from bytes already in memory
   */
  async *parseBytes(data: Uint8Array): AsyncIterable<Bif6Interval> {
    yield* await this.open(data);
  }

  /**
   * Parse intervals from base64 or hex encoded BIF6 data
   * @throws {ValidationError} If the string is not valid in the given encoding
   */
  async *parseString(
    data: string,
    encoding: "base64" | "hex" = "base64"
  ): AsyncIterable<Bif6Interval> {
    yield* this.parseBytes(decodeBinaryString(data, encoding));
  }

  /**
   * Read only the header of a file
   */
  async readHeader(source: Bif6Source): Promise<Bif6Header> {
    const session = await this.open(source);
    try {
      return session.header;
    } finally {
      await session.close();
    }
  }
}

/**
 * Open a BIF6 session
 *
 * @example
 * ```typescript
 * const session = await parseBif6('sample.bif6');
 * console.log(session.intervalCount, session.imageSize);
 * await session.close();
 * ```
 */
export async function parseBif6(
  source: Bif6Source,
  options: Bif6ParserOptions = {}
): Promise<Bif6Session> {
  return Bif6Session.open(source, options);
}

/**
 * Decode base64 or hex text to bytes
 */
function decodeBinaryString(data: string, encoding: "base64" | "hex"): Uint8Array {
  const cleaned = data.replace(/\s/g, "");

  if (encoding === "base64") {
    if (!/^[A-Za-z0-9+/]*={0,2}$/.test(cleaned) || cleaned.length % 4 !== 0) {
      throw new ValidationError("Invalid base64 string for BIF6 data");
    }
    return Uint8Array.from(atob(cleaned), (c) => c.charCodeAt(0));
  }

  if (!/^[0-9a-fA-F]*$/.test(cleaned) || cleaned.length % 2 !== 0) {
    throw new ValidationError("Invalid hex string for BIF6 data");
  }
  const bytes = new Uint8Array(cleaned.length / 2);
  for (let i = 0; i < cleaned.length; i += 2) {
    bytes[i / 2] = parseInt(cleaned.slice(i, i + 2), 16);
  }
  return bytes;
}

/**
 * BIF6 utility functions
 */
export const Bif6Utils = {
  /**
   * Detect if binary data starts with the BIF6 magic
   */
  detectFormat(data: Uint8Array): boolean {
    return isValidBif6Magic(data);
  },

  /**
   * Size in bytes of one interval record
   */
  recordSize(width: number, height: number): number {
    return recordSize(width, height);
  },

  /**
   * Size a file would have if it held exactly the declared intervals
   */
  expectedFileSize(header: Bif6Header): number {
    return HEADER_SIZE + header.intervalCount * recordSize(header.width, header.height);
  },

  /**
   * Whether an m/z value falls inside an interval's bounds (inclusive)
   */
  containsMz(interval: Bif6Interval, mz: number): boolean {
    return interval.mzLower <= mz && mz <= interval.mzUpper;
  },

  /**
   * Pixel statistics for one interval image
   *
   * `sum` is a bigint: a full 65535 x 65535 image of u32 values can exceed
   * `Number.MAX_SAFE_INTEGER`.
   */
  imageStatistics(interval: Bif6Interval): ImageStatistics {
    let min = Number.POSITIVE_INFINITY;
    let max = 0;
    let sum = 0n;
    let nonZero = 0;

    for (const column of interval.image) {
      for (const value of column) {
        if (value < min) min = value;
        if (value > max) max = value;
        sum += BigInt(value);
        if (value !== 0) nonZero++;
      }
    }

    return { min: min === Number.POSITIVE_INFINITY ? 0 : min, max, sum, nonZero };
  },

  /**
   * Drain a session into an array
   */
  async collect(session: Bif6Session): Promise<Bif6Interval[]> {
    const intervals: Bif6Interval[] = [];
    for await (const interval of session) {
      intervals.push(interval);
    }
    return intervals;
  },
} as const;
