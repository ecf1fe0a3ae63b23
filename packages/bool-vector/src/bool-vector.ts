/**
 * Fixed-width boolean vectors.
 *
 * `BoolVector<N>` packs N bits into `ceil(N / 8)` bytes, least significant
 * bit first: bit `i` lives in segment `i >> 3` at position `i & 7`. The width
 * is part of the type, so combining vectors of different widths is a compile
 * error.
 *
 * Invariant: storage bits past index N-1 (padding) are always zero.
 */

import {
  checkIndex,
  createLogger,
  isZeroInit,
  ZeroInit,
  type ZeroInitT,
} from "@numeris/core";

const log = createLogger("bool-vector");

// ============================================================================
// Storage Helpers
// ============================================================================

/** Number of byte segments backing a vector of `size` bits. */
export function dataSizeOf(size: number): number {
  return Math.ceil(size / 8);
}

/** Mask of the meaningful bits in the last segment of a `size`-bit vector. */
export function lastSegmentMask(size: number): number {
  const used = size % 8;
  return used === 0 ? 0xff : (1 << used) - 1;
}

/**
 * @throws RangeError unless `size` is a positive integer
 */
export function checkSize(size: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`BoolVector: size must be a positive integer, got ${size}`);
  }
}

export type BoolVectorInit = ZeroInitT | boolean | ArrayLike<number>;

// ============================================================================
// BoolVector Class
// ============================================================================

export class BoolVector<N extends number> {
  private readonly data: Uint8Array;

  /**
   * @param size - Width in bits
   * @param init - `ZeroInit` (default), a fill value, or raw segment bytes.
   *   Raw segments must number exactly `ceil(size / 8)`; padding bits in
   *   them are cleared.
   * @throws RangeError for a non-positive width or malformed segments
   */
  constructor(
    readonly size: N,
    init: BoolVectorInit = ZeroInit
  ) {
    checkSize(size);
    this.data = new Uint8Array(dataSizeOf(size));

    if (isZeroInit(init)) return;

    if (typeof init === "boolean") {
      if (init) {
        this.data.fill(0xff);
        this.clearPadding();
      }
      return;
    }

    this.load(init);
  }

  get dataSize(): number {
    return this.data.length;
  }

  private get label(): string {
    return `BoolVector<${this.size}>`;
  }

  private load(segments: ArrayLike<number>): void {
    if (segments.length !== this.data.length) {
      throw new RangeError(
        `${this.label}: expected ${this.data.length} segment(s), got ${segments.length}`
      );
    }

    for (let i = 0; i < segments.length; i++) {
      const segment = segments[i];
      if (!Number.isInteger(segment) || segment < 0 || segment > 0xff) {
        throw new RangeError(
          `${this.label}: segment ${i} must be an integer in [0, 255], got ${segment}`
        );
      }
      this.data[i] = segment;
    }

    const last = this.data.length - 1;
    const padding = this.data[last] & ~lastSegmentMask(this.size) & 0xff;
    if (padding !== 0) {
      log.debug(`${this.label}: cleared padding bits 0b${padding.toString(2)} in segment ${last}`);
      this.clearPadding();
    }
  }

  private clearPadding(): void {
    this.data[this.data.length - 1] &= lastSegmentMask(this.size);
  }

  /** Copy of the packed storage. */
  segments(): Uint8Array {
    return this.data.slice();
  }

  clone(): BoolVector<N> {
    return new BoolVector(this.size, this.data);
  }

  // --------------------------------------------------------------------------
  // Predicates
  // --------------------------------------------------------------------------

  /** True iff at least one bit is set. */
  toBool(): boolean {
    return this.any();
  }

  all(): boolean {
    const last = this.data.length - 1;
    for (let i = 0; i < last; i++) {
      if (this.data[i] !== 0xff) return false;
    }
    return this.data[last] === lastSegmentMask(this.size);
  }

  none(): boolean {
    return this.data.every((segment) => segment === 0);
  }

  any(): boolean {
    return !this.none();
  }

  // --------------------------------------------------------------------------
  // Bit Access
  // --------------------------------------------------------------------------

  /**
   * @throws IndexOutOfRangeError unless `i` is an integer in `[0, size)`
   */
  get(i: number): boolean {
    checkIndex(i, this.size, this.label);
    return ((this.data[i >> 3] >> (i & 7)) & 1) === 1;
  }

  /**
   * @throws IndexOutOfRangeError unless `i` is an integer in `[0, size)`
   */
  set(i: number, value: boolean): this {
    checkIndex(i, this.size, this.label);
    const bit = 1 << (i & 7);
    if (value) {
      this.data[i >> 3] |= bit;
    } else {
      this.data[i >> 3] &= ~bit;
    }
    return this;
  }

  *[Symbol.iterator](): IterableIterator<boolean> {
    for (let i = 0; i < this.size; i++) {
      yield ((this.data[i >> 3] >> (i & 7)) & 1) === 1;
    }
  }

  // --------------------------------------------------------------------------
  // Bitwise Algebra
  // --------------------------------------------------------------------------

  /** Bitwise complement. Padding bits stay zero. */
  not(): BoolVector<N> {
    const out = new BoolVector(this.size);
    for (let i = 0; i < this.data.length; i++) {
      out.data[i] = ~this.data[i];
    }
    out.clearPadding();
    return out;
  }

  and(other: BoolVector<N>): BoolVector<N> {
    return this.clone().andAssign(other);
  }

  or(other: BoolVector<N>): BoolVector<N> {
    return this.clone().orAssign(other);
  }

  xor(other: BoolVector<N>): BoolVector<N> {
    return this.clone().xorAssign(other);
  }

  andAssign(other: BoolVector<N>): this {
    for (let i = 0; i < this.data.length; i++) {
      this.data[i] &= other.data[i];
    }
    this.clearPadding();
    return this;
  }

  orAssign(other: BoolVector<N>): this {
    for (let i = 0; i < this.data.length; i++) {
      this.data[i] |= other.data[i];
    }
    this.clearPadding();
    return this;
  }

  xorAssign(other: BoolVector<N>): this {
    for (let i = 0; i < this.data.length; i++) {
      this.data[i] ^= other.data[i];
    }
    this.clearPadding();
    return this;
  }

  // --------------------------------------------------------------------------
  // Comparison and Rendering
  // --------------------------------------------------------------------------

  equals(other: BoolVector<N>): boolean {
    return this.data.every((segment, i) => segment === other.data[i]);
  }

  notEquals(other: BoolVector<N>): boolean {
    return !this.equals(other);
  }

  /**
   * Debug representation, e.g. `BoolVector(0b1010)`. Each segment is written
   * most significant bit first; segments appear in storage order separated
   * by `_`.
   */
  toString(): string {
    const last = this.data.length - 1;
    const parts = Array.from(this.data, (segment, i) => {
      const bits = i === last ? this.size - 8 * last : 8;
      return segment.toString(2).padStart(bits, "0");
    });
    return `BoolVector(0b${parts.join("_")})`;
  }
}
