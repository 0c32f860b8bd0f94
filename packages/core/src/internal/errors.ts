/**
 * Errors raised by the modifiers themselves (closure errors pass through untouched)
 */

export class IndexOutOfBoundsError extends RangeError {
  readonly index: number;
  readonly length: number;

  constructor(index: number, length: number, message = `Index ${index} out of bounds for length ${length}`) {
    super(message);
    this.name = 'IndexOutOfBoundsError';
    this.index = index;
    this.length = length;
  }
}

export function checkIndex(index: number, length: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new IndexOutOfBoundsError(index, length);
  }
}

// A hole in a sparse array has no element to hand out
export function checkElement(seq: object, index: number, length: number): void {
  if (!(index in seq)) {
    throw new IndexOutOfBoundsError(index, length, `No element at index ${index} (sparse hole)`);
  }
}
