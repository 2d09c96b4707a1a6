/**
 * Error handling for BIF6 decoding
 *
 * Every failure a session can hit has its own class so callers can tell a
 * file that is not BIF6 apart from one that was cut short or could not be read.
 */

const BIF6_MAGIC_DISPLAY = new Uint8Array([0x00, 0x00, 0x42, 0x49, 0x46, 0x36]);

function formatBytes(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

/**
 * Base error class for all bif6-reader errors
 */
export class Bif6Error extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly offset?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "Bif6Error";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.offset !== undefined) {
      msg += ` (byte offset ${this.offset})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for invalid arguments and options
 */
export class ValidationError extends Bif6Error {
  constructor(message: string, offset?: number, context?: string) {
    super(message, "VALIDATION_ERROR", offset, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends Bif6Error {
  constructor(
    message: string,
    public readonly format: string,
    offset?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", offset, context);
    this.name = "ParseError";
  }
}

/**
 * The first six bytes are not the BIF6 magic
 */
export class BadMagicError extends ParseError {
  constructor(public readonly actual: Uint8Array) {
    super(
      "Invalid BIF6 magic. Not a BIF6 file?",
      "BIF6",
      0,
      `Expected bytes: ${formatBytes(BIF6_MAGIC_DISPLAY)}, found: ${formatBytes(actual)}`
    );
    this.name = "BadMagicError";
  }
}

/**
 * The source ended before a complete file header could be read
 */
export class TruncatedHeaderError extends ParseError {
  constructor(
    public readonly expectedBytes: number,
    public readonly actualBytes: number
  ) {
    super(
      `Invalid BIF6 header: expected ${expectedBytes} bytes, got ${actualBytes}. Not a BIF6 file?`,
      "BIF6",
      0
    );
    this.name = "TruncatedHeaderError";
  }
}

/**
 * An interval record started but the source ended before it was complete
 */
export class TruncatedIntervalError extends ParseError {
  constructor(
    public readonly intervalIndex: number,
    public readonly expectedBytes: number,
    public readonly actualBytes: number,
    offset?: number
  ) {
    super(
      `Incomplete BIF6 interval #${intervalIndex}: expected ${expectedBytes} bytes, got ${actualBytes}`,
      "BIF6",
      offset,
      "File appears to be truncated or incomplete"
    );
    this.name = "TruncatedIntervalError";
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nInterval Index: ${this.intervalIndex}`;
    msg += `\nMissing Bytes: ${this.expectedBytes - this.actualBytes}`;
    return msg;
  }
}

/**
 * File I/O errors with detailed context
 */
export class FileError extends Bif6Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "open" | "close",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  /**
   * Get helpful suggestion based on system error
   */
  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Close unused file handles or increase system limits";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nFile: ${this.filePath}`;
    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }
    return msg;
  }
}

/**
 * A session was used after close()
 */
export class SessionClosedError extends Bif6Error {
  constructor(public readonly operation: string) {
    super(`Cannot ${operation}: BIF6 session is closed`, "SESSION_CLOSED");
    this.name = "SessionClosedError";
  }
}

/**
 * A session operation was called in a state that does not allow it
 */
export class SessionStateError extends Bif6Error {
  constructor(
    message: string,
    public readonly state: string
  ) {
    super(message, "SESSION_STATE", undefined, `Session state: ${state}`);
    this.name = "SessionStateError";
  }
}

/**
 * Stream processing errors for web stream sources
 */
export class StreamError extends Bif6Error {
  constructor(
    message: string,
    public readonly streamType: "read" | "close",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", bytesProcessed, context);
    this.name = "StreamError";
  }
}

/**
 * Resource limit validation errors
 */
export class ResourceLimitError extends ValidationError {
  constructor(
    message: string,
    public readonly resourceType: "buffer" | "file-size",
    public readonly actualValue: number,
    public readonly maxAllowed: number,
    context?: string
  ) {
    super(message, undefined, context);
    this.name = "ResourceLimitError";
  }

  /**
   * Create error for buffer size violations
   */
  static forBufferSize(actualSize: number, maxSize: number, operation: string): ResourceLimitError {
    const actualMB = Math.round(actualSize / 1_048_576);
    const maxMB = Math.round(maxSize / 1_048_576);

    return new ResourceLimitError(
      `${operation} buffer size too large: ${actualMB}MB (maximum ${maxMB}MB)`,
      "buffer",
      actualSize,
      maxSize,
      `Operation: ${operation}, Actual: ${actualSize} bytes, Max: ${maxSize} bytes`
    );
  }

  /**
   * Create error for files over the configured size limit
   */
  static forFileSize(actualSize: number, maxSize: number, filePath: string): ResourceLimitError {
    return new ResourceLimitError(
      `File too large: ${actualSize} bytes exceeds limit of ${maxSize} bytes`,
      "file-size",
      actualSize,
      maxSize,
      `File: ${filePath}`
    );
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nResource Limit Violation:`;
    msg += `\n  Type: ${this.resourceType}`;
    msg += `\n  Actual: ${this.actualValue.toLocaleString()} bytes`;
    msg += `\n  Maximum: ${this.maxAllowed.toLocaleString()} bytes`;
    return msg;
  }
}
