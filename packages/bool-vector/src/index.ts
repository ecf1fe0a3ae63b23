/**
 * @numeris/bool-vector - Fixed-width boolean vectors
 *
 * Packed bitsets whose width is part of the type, with bitwise algebra,
 * aggregate predicates and checked per-bit access.
 *
 * @example
 * ```typescript
 * import { boolVectorOf } from "@numeris/bool-vector";
 *
 * const BoolVector4 = boolVectorOf(4);
 * const mask = BoolVector4.fromSegments([0b1010]);
 * mask.get(1);                        // true
 * mask.not().toString();              // "BoolVector(0b0101)"
 * ```
 */

export {
  BoolVector,
  dataSizeOf,
  lastSegmentMask,
  checkSize,
  type BoolVectorInit,
} from "./bool-vector.js";
export { boolVectorOf, type BoolVectorKind } from "./kinds.js";
