/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Gives every format parser consistent AbortSignal support and warning
 * reporting without imposing parsing implementation details.
 */

import { ParseError } from "../errors";
import type { FileReaderOptions, ParserOptions } from "../types";

/**
 * Parser options after defaults have been applied
 */
export type ResolvedParserOptions<TOptions extends ParserOptions> = TOptions &
  Required<Pick<ParserOptions, "onWarning">>;

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: ResolvedParserOptions<TOptions>;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults = {
      onWarning: (warning: string): void => {
        console.warn(`${this.getFormatName()} Warning: ${warning}`);
      },
    };

    // Merge in order: base -> format-specific -> user options
    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Get format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Check abortion with format context in the message
   */
  protected throwIfAborted(context: string): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} ${context}`);
  }

  /**
   * Parse records from an encoded string (base64, hex)
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Parse records from a binary stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format identifier for error messages and logging (e.g. "BIF6")
   */
  protected abstract getFormatName(): string;
}

/**
 * AbortSignal checks shared by parsers and sessions
 */
export class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @param context - Where the abort was observed
   * @throws {ParseError} If operation was aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${context}`, "ABORTED");
    }
  }
}
