/**
 * Core type definitions for BIF6 mass-spectrometry imaging data
 *
 * Plain interfaces describe the decoded data; ArkType schemas validate the
 * option objects and paths callers hand to the library.
 */

import { type } from "arktype";
import { ResourceLimitError, ValidationError } from "./errors";

/**
 * Branded type for validated file paths
 */
export type FilePath = string & { readonly __brand: "FilePath" };

/**
 * Fixed BIF6 file header, parsed once when a session opens
 */
export interface Bif6Header {
  /** Number of interval records the file declares */
  readonly intervalCount: number;
  /** Image width in pixels (x axis) */
  readonly width: number;
  /** Image height in pixels (y axis) */
  readonly height: number;
}

/**
 * Image dimensions as `[width, height]`
 */
export type ImageSize = readonly [width: number, height: number];

/**
 * Decoded interval image, indexed `image[x][y]`
 *
 * One `Uint32Array` column of `height` pixels per x position.
 */
export type IntervalImage = readonly Uint32Array[];

/**
 * Raw fields of one decoded interval record
 */
export interface Bif6IntervalRecord {
  readonly id: number;
  readonly mzLower: number;
  readonly mzMiddle: number;
  readonly mzUpper: number;
  readonly image: IntervalImage;
}

/**
 * Pixel statistics over one interval image
 */
export interface ImageStatistics {
  readonly min: number;
  readonly max: number;
  readonly sum: bigint;
  readonly nonZero: number;
}

/**
 * Lifecycle of a decoding session
 *
 * `opened` → (`streaming`)* → `exhausted` | `failed`; `closed` from anywhere.
 */
export type SessionState = "opened" | "streaming" | "exhausted" | "failed" | "closed";

/**
 * Pull-based source of bytes owned by a single session
 */
export interface ByteSource {
  /** Human-readable origin (file path, `<memory>`, `<stream>`) */
  readonly description: string;
  /**
   * Read up to `length` bytes from the current position.
   * Resolves with fewer bytes only when the source has ended.
   */
  read(length: number): Promise<Uint8Array>;
  /** Release the underlying resource; safe to call more than once */
  close(): Promise<void>;
}

/**
 * Anything a session can be opened on
 */
export type Bif6Source = string | Uint8Array | ReadableStream<Uint8Array> | ByteSource;

/**
 * Base configuration shared by all parsers
 */
export interface ParserOptions {
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: (warning: string) => void;
}

/**
 * File reading options
 */
export interface FileReaderOptions {
  /** Largest single read issued against the file, in bytes */
  bufferSize?: number;
  /** Refuse files larger than this many bytes; 0 disables the check */
  maxFileSize?: number;
}

/**
 * BIF6 parser and session options
 */
export interface Bif6ParserOptions extends ParserOptions {
  /** Warn when the declared interval count differs from the records present */
  warnOnCountMismatch?: boolean;
  /** Options for sessions opened on a file path */
  fileOptions?: FileReaderOptions;
}

/**
 * File metadata gathered before opening a file
 */
export interface FileMetadata {
  readonly path: FilePath;
  readonly size: number;
  readonly lastModified: Date;
}

// Validation schemas using ArkType

/**
 * File path validation schema
 * Rejects empty paths and paths carrying null bytes
 */
export const FilePathSchema = type("string>0").pipe((path: string) => {
  if (path.includes("\0")) {
    throw new ValidationError("File paths cannot contain null characters");
  }
  return path as FilePath;
});

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>=1024", // Minimum 1KB buffer
  "maxFileSize?": "number>=0",
}).pipe((options) => {
  if (options.bufferSize !== undefined && options.bufferSize > 1_048_576) {
    throw ResourceLimitError.forBufferSize(options.bufferSize, 1_048_576, "File reader");
  }
  return options;
});

/**
 * BIF6 parser options validation schema
 */
export const Bif6ParserOptionsSchema = type({
  "signal?": "unknown", // AbortSignal
  "onWarning?": "unknown", // (warning: string) => void
  "warnOnCountMismatch?": "boolean",
  "fileOptions?": FileReaderOptionsSchema,
}).pipe((options) => {
  if (options.signal !== undefined && !(options.signal instanceof AbortSignal)) {
    throw new ValidationError("signal must be an AbortSignal");
  }
  if (options.onWarning !== undefined && typeof options.onWarning !== "function") {
    throw new ValidationError("onWarning must be a function");
  }
  return options;
});
