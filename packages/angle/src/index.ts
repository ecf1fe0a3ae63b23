/**
 * @numeris/angle - Type-Safe Angles
 *
 * Degrees and radians, in single and double precision, as distinct types.
 * Mixing units or precisions is a compile error; conversion is always
 * explicit.
 *
 * @example
 * ```typescript
 * import { deg, Rad } from "@numeris/angle";
 *
 * const right = deg(90);
 * const turn = right.mul(4);                 // Deg(360)
 * const inRadians = Rad.from(right);         // Rad(1.5708)
 * const ratio = turn.div(right);             // 4, a bare number
 *
 * // Compile error: can't add degrees and radians
 * // right.add(inRadians);
 * ```
 */

export * from "./types.js";
export * from "./kinds.js";
