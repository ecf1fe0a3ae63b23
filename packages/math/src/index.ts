/**
 * @numeris/math - Angles and bool vectors in one surface
 *
 * This package provides:
 * - **Angles**: `Deg`, `Rad`, `Degd`, `Radd` and their shortcuts
 * - **Bool vectors**: `BoolVector2`, `BoolVector3`, `BoolVector4`
 * - **Tags**: `ZeroInit`
 *
 * @example
 * ```typescript
 * import { Deg, Rad, BoolVector3, ZeroInit } from "@numeris/math";
 *
 * const a = Deg.of(90);
 * const b = Rad.from(a);                 // Rad(1.5708)
 * const flags = BoolVector3.of(ZeroInit);
 * flags.set(2, true);                    // BoolVector(0b100)
 * ```
 *
 * @packageDocumentation
 */

export { ZeroInit, type ZeroInitT, IndexOutOfRangeError } from "@numeris/core";

// ============================================================================
// Angles
// ============================================================================

export {
  Angle,
  Deg,
  Rad,
  Degd,
  Radd,
  deg,
  rad,
  degd,
  radd,
  type AngleKind,
  type AnyAngle,
  type AngleUnit,
  type Precision,
  type Degrees,
  type Radians,
  type Float,
  type Double,
} from "@numeris/angle";

// ============================================================================
// Bool vectors
// ============================================================================

export { BoolVector, boolVectorOf, type BoolVectorKind } from "@numeris/bool-vector";
export { BoolVector2, BoolVector3, BoolVector4 } from "./bool-vectors.js";
