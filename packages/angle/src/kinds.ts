import { isZeroInit, ZeroInit, type ZeroInitT } from "@numeris/core";
import {
  Angle,
  angleLabel,
  convertAngle,
  type AngleUnit,
  type Degrees,
  type Double,
  type Float,
  type Precision,
  type Radians,
} from "./types.js";

/**
 * Constructors for one unit/precision variant.
 */
export interface AngleKind<U extends AngleUnit, P extends Precision> {
  /** `Deg`, `Rad`, `Degd` or `Radd` */
  readonly name: string;
  readonly unit: U;
  readonly precision: P;
  /**
   * Explicit construction from a unitless value. Zero when called without a
   * value or with `ZeroInit`.
   */
  of(value?: number | ZeroInitT): Angle<U, P>;
  /**
   * Conversion from another variant: unit conversion, precision conversion,
   * or both. Passing the same variant makes a copy.
   */
  from<U2 extends AngleUnit, P2 extends Precision>(other: Angle<U2, P2>): Angle<U, P>;
}

export function angleKind<U extends AngleUnit, P extends Precision>(
  unit: U,
  precision: P
): AngleKind<U, P> {
  return {
    name: angleLabel(unit, precision),
    unit,
    precision,
    of: (value = ZeroInit) => new Angle(unit, precision, isZeroInit(value) ? 0 : value),
    from: (other) => convertAngle(other, unit, precision),
  };
}

// ============================================================================
// Variants
// ============================================================================

/** Float degrees */
export const Deg: AngleKind<Degrees, Float> = angleKind("deg", "float");
export type Deg = Angle<Degrees, Float>;

/** Float radians */
export const Rad: AngleKind<Radians, Float> = angleKind("rad", "float");
export type Rad = Angle<Radians, Float>;

/** Double degrees */
export const Degd: AngleKind<Degrees, Double> = angleKind("deg", "double");
export type Degd = Angle<Degrees, Double>;

/** Double radians */
export const Radd: AngleKind<Radians, Double> = angleKind("rad", "double");
export type Radd = Angle<Radians, Double>;

export const deg = (value: number): Deg => Deg.of(value);
export const rad = (value: number): Rad => Rad.of(value);
export const degd = (value: number): Degd => Degd.of(value);
export const radd = (value: number): Radd => Radd.of(value);
