import { type ZeroInitT } from "@numeris/core";
import { BoolVector, checkSize, dataSizeOf } from "./bool-vector.js";

/**
 * Constructors for one vector width.
 */
export interface BoolVectorKind<N extends number> {
  /** Width in bits */
  readonly SIZE: N;
  /** Number of byte segments */
  readonly DATA_SIZE: number;
  /**
   * All bits false when called without a value or with `ZeroInit`; every
   * bit set to `fill` otherwise.
   */
  of(fill?: ZeroInitT | boolean): BoolVector<N>;
  /**
   * Bits taken directly from raw segment bytes.
   *
   * @throws RangeError unless exactly `DATA_SIZE` bytes in `[0, 255]` are given
   */
  fromSegments(segments: ArrayLike<number>): BoolVector<N>;
}

/**
 * Define the constructors for `size`-bit vectors.
 *
 * @example
 * ```typescript
 * const BoolVector3 = boolVectorOf(3);
 * const v = BoolVector3.of(true);      // BoolVector<3>
 * v.set(1, false).toString();          // "BoolVector(0b101)"
 * ```
 *
 * @throws RangeError unless `size` is a positive integer
 */
export function boolVectorOf<N extends number>(size: N): BoolVectorKind<N> {
  checkSize(size);
  return {
    SIZE: size,
    DATA_SIZE: dataSizeOf(size),
    of: (fill) => new BoolVector(size, fill),
    fromSegments: (segments) => new BoolVector(size, segments),
  };
}
