/**
 * Thrown when a positional access falls outside `[0, size)`.
 */
export class IndexOutOfRangeError extends RangeError {
  constructor(
    readonly index: number,
    readonly size: number,
    readonly owner: string
  ) {
    super(`${owner}: index ${index} out of range [0, ${size})`);
    this.name = "IndexOutOfRangeError";
  }
}

/**
 * Throw an {@link IndexOutOfRangeError} unless `index` is an integer in `[0, size)`.
 */
export function checkIndex(index: number, size: number, owner: string): void {
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new IndexOutOfRangeError(index, size, owner);
  }
}
