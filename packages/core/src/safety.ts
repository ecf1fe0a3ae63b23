/**
 * Runtime Safety Primitives
 *
 * @example
 * ```typescript
 * type Unit = "deg" | "rad";
 * function symbol(unit: Unit): string {
 *   switch (unit) {
 *     case "deg": return "°";
 *     case "rad": return "rad";
 *     default: return unreachable(unit); // Type error if Unit is extended
 *   }
 * }
 * ```
 */

/**
 * Mark a code path as unreachable. Accepts `never`, so a switch that stops
 * being exhaustive fails to compile.
 */
export function unreachable(value: never): never {
  throw new Error(`Unreachable code reached with ${JSON.stringify(value)}`);
}
