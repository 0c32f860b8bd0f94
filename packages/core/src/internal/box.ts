/**
 * Box - a mutable zero-or-one container with hole/restore modification
 */

import { EMPTY } from './constants';
import type { Inout } from './types';
import { withWriteBack } from './write-back';

export class Box<T> {
  private slot: T | typeof EMPTY;

  private constructor(slot: T | typeof EMPTY) {
    this.slot = slot;
  }

  static of<T>(value: T): Box<T> {
    return new Box<T>(value);
  }

  static empty<T>(): Box<T> {
    return new Box<T>(EMPTY);
  }

  /** `undefined` becomes an empty box. Use `Box.of` to hold `undefined` itself. */
  static from<T>(value: T | undefined): Box<T> {
    return value === undefined ? Box.empty<T>() : Box.of<T>(value);
  }

  get isEmpty(): boolean {
    return this.slot === EMPTY;
  }

  get(): T | undefined {
    const slot = this.slot;
    return slot === EMPTY ? undefined : slot;
  }

  getOrElse(fallback: T): T {
    const slot = this.slot;
    return slot === EMPTY ? fallback : slot;
  }

  set(value: T): void {
    this.slot = value;
  }

  clear(): void {
    this.slot = EMPTY;
  }

  /** Move the value out, leaving the box empty. */
  take(): T | undefined {
    const slot = this.slot;
    this.slot = EMPTY;
    return slot === EMPTY ? undefined : slot;
  }

  replace(value: T): T | undefined {
    const previous = this.take();
    this.slot = value;
    return previous;
  }

  /**
   * Hand the held value to `fn` for in-place modification.
   *
   * The value is moved out first, so the box reads as empty while `fn` runs
   * and `fn` is the only holder. Whatever `fn` leaves in the cell is moved
   * back before its result (or error) reaches the caller. An empty box
   * returns `undefined` without calling `fn`.
   *
   * Not reentrant: a nested `modifyIfPresent` on this box sees it empty and
   * does nothing, and a `set` from inside `fn` is overwritten by the restore.
   */
  modifyIfPresent<R>(fn: (value: Inout<T>) => R): R | undefined {
    const slot = this.slot;
    if (slot === EMPTY) return undefined;

    this.slot = EMPTY;
    return withWriteBack<Inout<T>, R>(
      { value: slot },
      cell => {
        this.slot = cell.value;
      },
      fn
    );
  }

  toString(): string {
    const slot = this.slot;
    return slot === EMPTY ? 'Box(empty)' : `Box(${String(slot)})`;
  }
}

/**
 * Function form of `Box#modifyIfPresent`.
 *
 *     const n = Box.of(42);
 *     modifyIfPresent(n, v => { v.value *= 2; });
 *     n.get(); // 84
 */
export function modifyIfPresent<T, R>(box: Box<T>, fn: (value: Inout<T>) => R): R | undefined {
  return box.modifyIfPresent(fn);
}
