/**
 * Tag requesting zero-initialized construction, e.g. `Deg.of(ZeroInit)`.
 */
export const ZeroInit = Object.freeze({ _tag: "ZeroInit" as const });

export type ZeroInitT = typeof ZeroInit;

export function isZeroInit(value: unknown): value is ZeroInitT {
  return value === ZeroInit;
}
