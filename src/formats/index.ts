/**
 * Central format module exports
 */

export { AbstractParser, InterruptHandler, type ResolvedParserOptions } from "./abstract-parser";
export { Bif6Parser, Bif6Utils, parseBif6 } from "./bif6";
export {
  BIF6_MAGIC,
  BinaryParser,
  BYTES_PER_PIXEL,
  HEADER_SIZE,
  isValidBif6Magic,
  parseHeader,
  parseIntervalRecord,
  RECORD_HEADER_SIZE,
  recordSize,
  transposePixels,
} from "./bif6/binary";
export { Bif6Interval } from "./bif6/interval";
export { Bif6Session } from "./bif6/session";
