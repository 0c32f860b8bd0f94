/**
 * Indexed modifier - direct in-place access to one element of a sequence
 */

import { checkElement, checkIndex } from './errors';
import type { Inout, MutableSequence } from './types';

/**
 * Modify the element at `index` in place.
 *
 *     const streets = ['Adams Street', 'Butler', 'Channing Street'];
 *     modifyAt(streets, 1, s => { s.value += ' Street'; });
 *     streets[1]; // 'Butler Street'
 *
 * Throws `IndexOutOfBoundsError` without calling `fn` unless
 * `0 <= index < seq.length` and the slot holds an element (not a hole in a
 * sparse array).
 */
export function modifyAt<T, R>(
  seq: MutableSequence<T>,
  index: number,
  fn: (element: Inout<T>) => R
): R {
  checkIndex(index, seq.length);
  checkElement(seq, index, seq.length);

  // No hole: every slot in range always holds an element, so the cell
  // addresses it directly.
  return fn({
    get value(): T {
      return seq[index];
    },
    set value(next: T) {
      seq[index] = next;
    },
  });
}
