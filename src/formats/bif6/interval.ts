import type { Bif6IntervalRecord, ImageSize, IntervalImage } from "../../types";

/**
 * A single decoded interval: an m/z range and its intensity image
 *
 * Instances are frozen and share nothing with the session that produced them.
 *
 * @example
 * ```typescript
 * const interval = await session.next();
 * if (interval !== null) {
 *   console.log(`${interval.mzLower}..${interval.mzUpper}: ${interval.image[0][0]}`);
 * }
 * ```
 */
export class Bif6Interval implements Bif6IntervalRecord {
  /** Identifier for this interval; uniqueness is not checked */
  readonly id: number;
  /** Lower bound of the m/z interval */
  readonly mzLower: number;
  /** Middle of the m/z interval */
  readonly mzMiddle: number;
  /** Upper bound of the m/z interval */
  readonly mzUpper: number;
  /** Pixel intensities indexed `image[x][y]` */
  readonly image: IntervalImage;
  /** Image width (number of columns) */
  readonly width: number;
  /** Image height (pixels per column), kept even when there are no columns */
  readonly height: number;

  /**
   * @param size Declared `[width, height]`; derived from `image` when omitted
   */
  constructor(record: Bif6IntervalRecord, size?: ImageSize) {
    this.id = record.id;
    this.mzLower = record.mzLower;
    this.mzMiddle = record.mzMiddle;
    this.mzUpper = record.mzUpper;
    this.image = record.image;
    [this.width, this.height] = size ?? [record.image.length, record.image[0]?.length ?? 0];
    Object.freeze(this);
  }

  /**
   * Whether this is the total-ion-count image
   *
   * The TIC image is conventionally the first interval of a file and carries id 0.
   */
  isTicImage(): boolean {
    return this.id === 0;
  }
}
