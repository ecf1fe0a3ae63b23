/**
 * Type-Safe Angles
 *
 * An angle carries its unit (degrees or radians) and its precision
 * (single or double) in the type system, so that adding degrees to
 * radians, or a float angle to a double one, is a compile error rather
 * than a silent bug.
 *
 * - Unit: `"deg"` | `"rad"`
 * - Precision: `"float"` | `"double"`
 *
 * Float precision is emulated by rounding every stored value, and every
 * intermediate of a float computation, to IEEE-754 single precision.
 */

import { config, formatScalar, unreachable } from "@numeris/core";

// ============================================================================
// Unit and Precision Tags
// ============================================================================

export type Degrees = "deg";
export type Radians = "rad";
export type AngleUnit = Degrees | Radians;

export type Float = "float";
export type Double = "double";
export type Precision = Float | Double;

// ============================================================================
// Scalar Helpers
// ============================================================================

/**
 * Round a value to the storage of the given precision.
 */
export function castTo(precision: Precision, value: number): number {
  switch (precision) {
    case "float":
      return Math.fround(value);
    case "double":
      return value;
    default:
      return unreachable(precision);
  }
}

const EPSILON: Record<Precision, number> = {
  float: 1.0e-5,
  double: 1.0e-14,
};

/** Comparison epsilon used by {@link Angle.equals} for the given precision. */
export function epsilonOf(precision: Precision): number {
  return EPSILON[precision];
}

/**
 * Fuzzy floating-point equality.
 *
 * Values near zero are compared by absolute difference, everything else by
 * difference relative to the magnitudes. NaN is never equal to anything.
 */
export function fuzzyEquals(a: number, b: number, epsilon: number): boolean {
  if (a === b) return true;

  const difference = Math.abs(a - b);
  if (a === 0 || b === 0 || difference < epsilon) {
    return difference < epsilon;
  }

  return difference / (Math.abs(a) + Math.abs(b)) < epsilon;
}

/**
 * Convert a unitless value between units, computing in `precision`.
 */
function convertUnit(value: number, from: AngleUnit, to: AngleUnit, precision: Precision): number {
  if (from === to) return value;

  const f = (n: number): number => castTo(precision, n);
  const pi = f(Math.PI);
  return to === "rad" ? f(f(value * pi) / 180) : f(f(180 * value) / pi);
}

const LABELS: Record<AngleUnit, Record<Precision, string>> = {
  deg: { float: "Deg", double: "Degd" },
  rad: { float: "Rad", double: "Radd" },
};

/** Variant name of a unit/precision pair: `Deg`, `Rad`, `Degd` or `Radd`. */
export function angleLabel(unit: AngleUnit, precision: Precision): string {
  return LABELS[unit][precision];
}

function digitsFor(precision: Precision): number {
  return precision === "float"
    ? config.getNumber("format.floatDigits", 6)
    : config.getNumber("format.doubleDigits", 15);
}

// ============================================================================
// Angle Class
// ============================================================================

/**
 * An angle value tagged with its unit and precision.
 */
export class Angle<U extends AngleUnit, P extends Precision> {
  private _value: number;

  constructor(
    readonly unit: U,
    readonly precision: P,
    value: number = 0
  ) {
    this._value = castTo(precision, value);
  }

  /**
   * The bare value, discarding the unit.
   */
  toUnderlying(): number {
    return this._value;
  }

  clone(): Angle<U, P> {
    return this.make(this._value);
  }

  private make(value: number): Angle<U, P> {
    return new Angle(this.unit, this.precision, value);
  }

  private cast(value: number): number {
    return castTo(this.precision, value);
  }

  // --------------------------------------------------------------------------
  // Conversions
  // --------------------------------------------------------------------------

  /** Degrees to radians, multiplying by π/180 in this angle's precision. */
  toRad(this: Angle<Degrees, P>): Angle<Radians, P> {
    return convertAngle(this, "rad", this.precision);
  }

  /** Radians to degrees, multiplying by 180/π in this angle's precision. */
  toDeg(this: Angle<Radians, P>): Angle<Degrees, P> {
    return convertAngle(this, "deg", this.precision);
  }

  toDouble(this: Angle<U, Float>): Angle<U, Double> {
    return convertAngle(this, this.unit, "double");
  }

  /** Narrow to single precision. */
  toFloat(this: Angle<U, Double>): Angle<U, Float> {
    return convertAngle(this, this.unit, "float");
  }

  // --------------------------------------------------------------------------
  // Comparison
  // --------------------------------------------------------------------------

  /**
   * Fuzzy equality, see {@link fuzzyEquals}. The epsilon is 1e-5 for float
   * and 1e-14 for double angles.
   */
  equals(other: Angle<U, P>): boolean {
    return fuzzyEquals(this._value, other._value, EPSILON[this.precision]);
  }

  notEquals(other: Angle<U, P>): boolean {
    return !this.equals(other);
  }

  lessThan(other: Angle<U, P>): boolean {
    return this._value < other._value;
  }

  greaterThan(other: Angle<U, P>): boolean {
    return this._value > other._value;
  }

  lessThanOrEqual(other: Angle<U, P>): boolean {
    return !this.greaterThan(other);
  }

  greaterThanOrEqual(other: Angle<U, P>): boolean {
    return !this.lessThan(other);
  }

  /**
   * Three-way comparison for sorting. Unordered values (NaN) compare as 0.
   */
  compare(other: Angle<U, P>): -1 | 0 | 1 {
    if (this.lessThan(other)) return -1;
    if (this.greaterThan(other)) return 1;
    return 0;
  }

  // --------------------------------------------------------------------------
  // Arithmetic
  // --------------------------------------------------------------------------

  neg(): Angle<U, P> {
    return this.make(-this._value);
  }

  add(other: Angle<U, P>): Angle<U, P> {
    return this.make(this._value + other._value);
  }

  sub(other: Angle<U, P>): Angle<U, P> {
    return this.make(this._value - other._value);
  }

  /**
   * Scale by a unitless number
   */
  mul(factor: number): Angle<U, P> {
    return this.make(this._value * this.cast(factor));
  }

  /**
   * Divide by a unitless number, or by another angle of the same unit and
   * precision. The ratio of two angles is dimensionless and comes back as a
   * bare number.
   */
  div(divisor: number): Angle<U, P>;
  div(divisor: Angle<U, P>): number;
  div(divisor: number | Angle<U, P>): Angle<U, P> | number {
    if (typeof divisor === "number") {
      return this.make(this._value / this.cast(divisor));
    }
    return this.cast(this._value / divisor._value);
  }

  addAssign(other: Angle<U, P>): this {
    this._value = this.cast(this._value + other._value);
    return this;
  }

  subAssign(other: Angle<U, P>): this {
    this._value = this.cast(this._value - other._value);
    return this;
  }

  mulAssign(factor: number): this {
    this._value = this.cast(this._value * this.cast(factor));
    return this;
  }

  divAssign(divisor: number): this {
    this._value = this.cast(this._value / this.cast(divisor));
    return this;
  }

  // --------------------------------------------------------------------------
  // Rendering
  // --------------------------------------------------------------------------

  /**
   * Debug representation, e.g. `Deg(45)` or `Rad(3.14159)`.
   */
  toString(): string {
    const digits = digitsFor(this.precision);
    return `${angleLabel(this.unit, this.precision)}(${formatScalar(this._value, digits)})`;
  }
}

/** An angle of any unit and precision. */
export type AnyAngle = Angle<AngleUnit, Precision>;

/**
 * Convert an angle to another unit and/or precision.
 *
 * The unit conversion runs in the source precision, then the result is
 * cast to the target precision.
 */
export function convertAngle<
  U1 extends AngleUnit,
  P1 extends Precision,
  U2 extends AngleUnit,
  P2 extends Precision,
>(angle: Angle<U1, P1>, unit: U2, precision: P2): Angle<U2, P2> {
  const value = convertUnit(angle.toUnderlying(), angle.unit, unit, angle.precision);
  return new Angle(unit, precision, value);
}
