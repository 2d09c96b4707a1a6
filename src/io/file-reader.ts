/**
 * Byte sources for BIF6 sessions
 *
 * A session pulls fixed-size records from a {@link ByteSource}. Files are read
 * through Effect's platform FileSystem with the handle held open in a scope
 * until the session releases it; in-memory bytes and web streams get their
 * own small sources with the same contract.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Exit, Option, Scope } from "effect";
import { FileError, ResourceLimitError, StreamError } from "../errors";
import type {
  Bif6Source,
  ByteSource,
  FileMetadata,
  FilePath,
  FileReaderOptions,
} from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { detectRuntime, getPlatform } from "./runtime";

// Module-level constants for default options
const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536, // 64KB standard buffer size
  maxFileSize: 10_737_418_240, // 10GB
};

/**
 * Check if a file exists and is a regular file
 *
 * @param path File path to check
 * @returns Promise resolving to true if the path names an existing file
 * @throws {FileError} If path validation or the stat call fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file size and modification time
 *
 * @param path File path to analyze
 * @throws {FileError} If the file cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);

    return {
      path: validatedPath,
      size: Number(info.size),
      lastModified: Option.getOrElse(info.mtime, () => new Date(0)),
    };
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Open a file as a byte source
 *
 * The file handle stays open until the returned source is closed.
 *
 * @param path File path to open
 * @param options Reading options
 * @throws {FileError} If the file cannot be opened
 * @throws {ResourceLimitError} If the file exceeds `maxFileSize`
 */
export async function openFileSource(
  path: string,
  options: FileReaderOptions = {}
): Promise<ByteSource> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);
  const startTime = Date.now();

  if (mergedOptions.maxFileSize > 0) {
    const { size } = await getMetadata(validatedPath);
    if (size > mergedOptions.maxFileSize) {
      throw ResourceLimitError.forFileSize(size, mergedOptions.maxFileSize, validatedPath);
    }
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const scope = yield* Scope.make();
    const file = yield* fs.open(validatedPath, { flag: "r" }).pipe(Scope.extend(scope));
    return { file, scope };
  });

  try {
    const { file, scope } = await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
    return new FileByteSource(validatedPath, file, scope, mergedOptions.bufferSize);
  } catch (error) {
    const elapsed = Date.now() - startTime;
    const enhanced = FileError.fromSystemError("open", validatedPath, error);
    enhanced.message += ` (failed after ${elapsed}ms, runtime: ${detectRuntime()})`;
    throw enhanced;
  }
}

/**
 * Resolve any supported session input to a byte source
 *
 * Strings are file paths; byte arrays and web streams are wrapped; objects
 * already implementing {@link ByteSource} pass through.
 */
export async function createByteSource(
  source: Bif6Source,
  options: FileReaderOptions = {}
): Promise<ByteSource> {
  if (typeof source === "string") {
    return openFileSource(source, options);
  }
  if (source instanceof Uint8Array) {
    return new BufferByteSource(source);
  }
  if (source instanceof ReadableStream) {
    return new StreamByteSource(source);
  }
  return source;
}

/**
 * File handle opened in an Effect scope
 */
class FileByteSource implements ByteSource {
  private closed = false;

  constructor(
    readonly description: FilePath,
    private readonly file: FileSystem.File,
    private readonly scope: Scope.CloseableScope,
    private readonly bufferSize: number
  ) {}

  async read(length: number): Promise<Uint8Array> {
    if (this.closed) {
      throw new FileError("read operation failed: file is closed", this.description, "read");
    }

    const { file, bufferSize } = this;
    const program = Effect.gen(function* () {
      const chunks: Uint8Array[] = [];
      let remaining = length;
      while (remaining > 0) {
        const chunk = yield* file.readAlloc(Math.min(remaining, bufferSize));
        if (Option.isNone(chunk)) break;
        chunks.push(chunk.value);
        remaining -= chunk.value.length;
      }
      return concatChunks(chunks, length - remaining);
    });

    try {
      return await Effect.runPromise(program);
    } catch (error) {
      throw FileError.fromSystemError("read", this.description, error);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      await Effect.runPromise(Scope.close(this.scope, Exit.void));
    } catch (error) {
      throw FileError.fromSystemError("close", this.description, error);
    }
  }
}

/**
 * Byte source over an in-memory buffer
 */
export class BufferByteSource implements ByteSource {
  readonly description = "<memory>";
  private position = 0;
  private closed = false;

  constructor(private readonly data: Uint8Array) {}

  async read(length: number): Promise<Uint8Array> {
    if (this.closed) {
      throw new StreamError("Cannot read from a closed buffer source", "read", this.position);
    }

    const end = Math.min(this.position + length, this.data.length);
    const chunk = this.data.slice(this.position, end);
    this.position = end;
    return chunk;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Byte source over a web ReadableStream
 *
 * Stream chunks rarely line up with record boundaries, so bytes are buffered
 * until a read can be satisfied or the stream ends.
 */
export class StreamByteSource implements ByteSource {
  readonly description = "<stream>";
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;
  private buffered: Uint8Array = new Uint8Array(0);
  private ended = false;
  private closed = false;
  private bytesProcessed = 0;

  constructor(stream: ReadableStream<Uint8Array>) {
    this.reader = stream.getReader();
  }

  async read(length: number): Promise<Uint8Array> {
    if (this.closed) {
      throw new StreamError("Cannot read from a closed stream source", "read", this.bytesProcessed);
    }

    try {
      while (this.buffered.length < length && !this.ended) {
        const { done, value } = await this.reader.read();
        if (done) {
          this.ended = true;
          break;
        }
        this.buffered = appendToBuffer(this.buffered, value);
      }
    } catch (error) {
      throw new StreamError(
        `Stream read failed: ${error instanceof Error ? error.message : String(error)}`,
        "read",
        this.bytesProcessed
      );
    }

    const chunk = this.buffered.slice(0, length);
    this.buffered = this.buffered.slice(chunk.length);
    this.bytesProcessed += chunk.length;
    return chunk;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.buffered = new Uint8Array(0);

    try {
      await this.reader.cancel();
    } catch (error) {
      throw new StreamError(
        `Stream cancel failed: ${error instanceof Error ? error.message : String(error)}`,
        "close",
        this.bytesProcessed
      );
    } finally {
      this.reader.releaseLock();
    }
  }
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Validate file path using ArkType and return branded type
 * Maintains FileError interface contract for callers
 */
function validatePath(path: string): FilePath {
  try {
    const validationResult = FilePathSchema(path);
    if (validationResult instanceof type.errors) {
      throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
    }
    return validationResult;
  } catch (error) {
    if (error instanceof FileError) throw error;
    throw new FileError(
      `Invalid file path: ${error instanceof Error ? error.message : String(error)}`,
      path,
      "stat"
    );
  }
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };

  // Validate merged options with ArkType
  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return merged;
}

function concatChunks(chunks: Uint8Array[], totalLength: number): Uint8Array {
  if (chunks.length === 1 && chunks[0] !== undefined) {
    return chunks[0];
  }
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

function appendToBuffer(buffer: Uint8Array, chunk: Uint8Array): Uint8Array {
  if (buffer.length === 0) return chunk;
  const result = new Uint8Array(buffer.length + chunk.length);
  result.set(buffer, 0);
  result.set(chunk, buffer.length);
  return result;
}
