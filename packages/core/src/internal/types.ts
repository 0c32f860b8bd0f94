/**
 * Core type definitions
 */

// Mutable reference handed to a modification closure (an `inout` parameter)
export interface Inout<T> {
  value: T;
}

// Values a keyed store can bind; `undefined` is reserved for "absent"
export type Present = {} | null;

// Keyed collaborator. Map and WeakMap satisfy this structurally.
export interface KeyedStore<K, V extends Present> {
  get(key: K): V | undefined;
  set(key: K, value: V): unknown;
  delete(key: K): boolean;
}

// Index-addressable collaborator. Arrays and typed arrays satisfy this structurally.
export interface MutableSequence<T> {
  readonly length: number;
  [index: number]: T;
}
