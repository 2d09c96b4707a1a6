/**
 * bif6-reader - decoder for BIF6 mass-spectrometry imaging files
 *
 * Opens a BIF6 file, validates its header and yields one interval (an m/z
 * range plus its intensity image) at a time.
 */

// Error types
export {
  BadMagicError,
  Bif6Error,
  FileError,
  ParseError,
  ResourceLimitError,
  SessionClosedError,
  SessionStateError,
  StreamError,
  TruncatedHeaderError,
  TruncatedIntervalError,
  ValidationError,
} from "./errors";
// BIF6 format
export {
  BIF6_MAGIC,
  Bif6Interval,
  Bif6Parser,
  Bif6Session,
  Bif6Utils,
  BinaryParser,
  HEADER_SIZE,
  parseBif6,
  RECORD_HEADER_SIZE,
} from "./formats";
// File I/O infrastructure
export {
  BufferByteSource,
  createByteSource,
  exists,
  getMetadata,
  openFileSource,
  StreamByteSource,
} from "./io/file-reader";
export { detectRuntime, type Runtime } from "./io/runtime";
// Core types
export type {
  Bif6Header,
  Bif6IntervalRecord,
  Bif6ParserOptions,
  Bif6Source,
  ByteSource,
  FileMetadata,
  FilePath,
  FileReaderOptions,
  ImageSize,
  ImageStatistics,
  IntervalImage,
  ParserOptions,
  SessionState,
} from "./types";
export { Bif6ParserOptionsSchema, FilePathSchema, FileReaderOptionsSchema } from "./types";
