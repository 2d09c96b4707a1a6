/**
 * BIF6 decoding session
 *
 * A session owns one byte source from `open()` until `close()` (or until the
 * sequence ends or fails, which release the source early). Intervals are
 * decoded one record at a time, forward only.
 */

import { type } from "arktype";
import { SessionClosedError, SessionStateError, TruncatedIntervalError, ValidationError } from "../../errors";
import { createByteSource } from "../../io/file-reader";
import type {
  Bif6Header,
  Bif6ParserOptions,
  Bif6Source,
  ByteSource,
  ImageSize,
  SessionState,
} from "../../types";
import { Bif6ParserOptionsSchema } from "../../types";
import { InterruptHandler } from "../abstract-parser";
import { HEADER_SIZE, parseHeader, parseIntervalRecord, recordSize } from "./binary";
import { Bif6Interval } from "./interval";

interface ResolvedSessionOptions {
  readonly onWarning: (warning: string) => void;
  readonly warnOnCountMismatch: boolean;
  readonly signal?: AbortSignal;
}

/**
 * Forward-only reader over the intervals of one BIF6 file
 *
 * @example Pull intervals one at a time
 * ```typescript
 * const session = await Bif6Session.open('sample.bif6');
 * const [width, height] = session.imageSize;
 * let interval = await session.next();
 * while (interval !== null) {
 *   console.log(interval.id, interval.mzMiddle);
 *   interval = await session.next();
 * }
 * ```
 *
 * @example Async iteration (closes the session on break)
 * ```typescript
 * for await (const interval of await Bif6Session.open(bytes)) {
 *   if (interval.isTicImage()) break;
 * }
 * ```
 */
export class Bif6Session implements AsyncIterable<Bif6Interval> {
  private state: SessionState = "opened";
  private failure: unknown;
  private produced = 0;
  private position = HEADER_SIZE;
  private pending = false;
  private readonly interruptHandler: InterruptHandler;

  private constructor(
    private readonly source: ByteSource,
    readonly header: Bif6Header,
    private readonly options: ResolvedSessionOptions
  ) {
    this.interruptHandler = new InterruptHandler(options.signal);
  }

  /**
   * Open a session and parse the file header
   *
   * @param source File path, bytes, web stream or custom {@link ByteSource}
   * @throws {TruncatedHeaderError} If the source holds fewer than 12 bytes
   * @throws {BadMagicError} If the source is not BIF6
   * @throws {FileError} If a file cannot be opened or read
   */
  static async open(source: Bif6Source, options: Bif6ParserOptions = {}): Promise<Bif6Session> {
    const resolved = resolveOptions(options);
    const byteSource = await createByteSource(source, options.fileOptions);

    try {
      new InterruptHandler(resolved.signal).throwIfAborted("BIF6 header read");
      const header = parseHeader(await byteSource.read(HEADER_SIZE));
      return new Bif6Session(byteSource, header, resolved);
    } catch (error) {
      await releaseSource(byteSource, resolved.onWarning);
      throw error;
    }
  }

  /** Number of intervals the header declares */
  get intervalCount(): number {
    return this.header.intervalCount;
  }

  /** `[width, height]` of every interval image */
  get imageSize(): ImageSize {
    return [this.header.width, this.header.height];
  }

  /** Current lifecycle state */
  get sessionState(): SessionState {
    return this.state;
  }

  /** Number of intervals decoded so far */
  get intervalsRead(): number {
    return this.produced;
  }

  /** Byte offset of the next record */
  get bytesRead(): number {
    return this.position;
  }

  /** Where the bytes come from (file path, `<memory>`, `<stream>`) */
  get sourceDescription(): string {
    return this.source.description;
  }

  /**
   * True once the sequence has ended with a record count different from
   * {@link intervalCount}
   */
  get countMismatch(): boolean {
    return this.state === "exhausted" && this.produced !== this.header.intervalCount;
  }

  /**
   * Decode the next interval
   *
   * @returns The next interval, or `null` once the source has no more records
   * @throws {TruncatedIntervalError} If a record is cut short
   * @throws {SessionClosedError} If the session was closed
   * @throws {SessionStateError} If another `next()` call is still pending
   */
  async next(): Promise<Bif6Interval | null> {
    switch (this.state) {
      case "closed":
        throw new SessionClosedError("read next interval");
      case "exhausted":
        return null;
      case "failed":
        throw this.failure;
    }

    if (this.pending) {
      throw new SessionStateError("next() called while a previous read is still pending", this.state);
    }

    this.pending = true;
    try {
      return await this.readInterval();
    } finally {
      this.pending = false;
    }
  }

  /**
   * Release the byte source; calling it again is a no-op
   */
  async close(): Promise<void> {
    if (this.state === "closed") return;
    const released = this.state === "exhausted" || this.state === "failed";
    this.state = "closed";
    if (!released) {
      await this.source.close();
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Bif6Interval, void, undefined> {
    try {
      let interval = await this.next();
      while (interval !== null) {
        yield interval;
        interval = await this.next();
      }
    } finally {
      if (this.state === "opened" || this.state === "streaming") {
        await this.close();
      }
    }
  }

  private async readInterval(): Promise<Bif6Interval | null> {
    const { width, height } = this.header;
    const size = recordSize(width, height);

    let bytes: Uint8Array;
    try {
      this.interruptHandler.throwIfAborted(`BIF6 interval #${this.produced} read`);
      bytes = await this.source.read(size);
    } catch (error) {
      if (this.state === "closed") {
        throw new SessionClosedError("read next interval");
      }
      await this.fail(error);
      throw error;
    }

    // close() may have run while the read was in flight
    if (this.state === "closed") {
      throw new SessionClosedError("read next interval");
    }

    if (bytes.length === 0) {
      await this.finish();
      return null;
    }

    if (bytes.length < size) {
      const error = new TruncatedIntervalError(this.produced, size, bytes.length, this.position);
      await this.fail(error);
      throw error;
    }

    const interval = new Bif6Interval(parseIntervalRecord(bytes, width, height), [width, height]);
    this.position += size;
    this.produced++;
    this.state = "streaming";
    return interval;
  }

  private async finish(): Promise<void> {
    this.state = "exhausted";
    await this.source.close();

    if (this.options.warnOnCountMismatch && this.countMismatch) {
      this.options.onWarning(
        `${this.source.description} declares ${this.header.intervalCount} intervals but contains ${this.produced}`
      );
    }
  }

  private async fail(error: unknown): Promise<void> {
    this.state = "failed";
    this.failure = error;
    await releaseSource(this.source, this.options.onWarning);
  }
}

/**
 * Close a source after a failure without letting a close error replace it
 */
async function releaseSource(source: ByteSource, onWarning: (warning: string) => void): Promise<void> {
  try {
    await source.close();
  } catch (closeError) {
    onWarning(
      `Failed to release ${source.description}: ${closeError instanceof Error ? closeError.message : String(closeError)}`
    );
  }
}

/**
 * Validate options with ArkType and apply defaults
 */
function resolveOptions(options: Bif6ParserOptions): ResolvedSessionOptions {
  const validationResult = Bif6ParserOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid BIF6 options: ${validationResult.summary}`);
  }

  return {
    onWarning:
      options.onWarning ??
      ((warning: string): void => {
        console.warn(`BIF6 Warning: ${warning}`);
      }),
    warnOnCountMismatch: options.warnOnCountMismatch ?? true,
    signal: options.signal,
  };
}
