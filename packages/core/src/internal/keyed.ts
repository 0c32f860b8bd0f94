/**
 * Keyed modifiers - in-place modification of the value bound to a key
 */

import { Box } from './box';
import type { Inout, KeyedStore, Present } from './types';
import { withWriteBack } from './write-back';

/**
 * Modify the value bound to `key`, inserting `defaultValue()` first when the
 * key is absent.
 *
 *     const hues = new Map([['Coral', 16]]);
 *     modifyOrInsert(hues, 'Coral', () => 16, v => { v.value += 2; });   // Coral → 18
 *     modifyOrInsert(hues, 'Cerise', () => 328, v => { v.value += 2; }); // Cerise → 330
 *
 * The final value is always written back under `key`, whether `V` is a
 * primitive, a record replaced through the cell, or an instance mutated in
 * place, and whether or not `fn` throws. If `defaultValue` throws, the store
 * is left as it was and `fn` is not called.
 */
export function modifyOrInsert<K, V extends Present, R>(
  store: KeyedStore<K, V>,
  key: K,
  defaultValue: () => V,
  fn: (value: Inout<V>) => R
): R {
  let value = store.get(key);
  if (value === undefined) {
    // A throwing default leaves the store untouched
    value = defaultValue();
    store.set(key, value);
  }

  return withWriteBack<Inout<V>, R>(
    { value },
    cell => {
      store.set(key, cell.value);
    },
    fn
  );
}

/**
 * Modify the presence and value of `key` through a Box.
 *
 * `fn` always runs. The box holds the bound value, or is empty when the key
 * is absent. Afterwards (also when `fn` throws) the box state is committed:
 * a held value is upserted, an emptied box deletes a present key, and an
 * absent key left empty stays absent.
 *
 *     modify(hues, 'Coral', slot => slot.modifyIfPresent(v => { v.value += 2; }));
 *     modify(hues, 'Aquamarine', slot => slot.set(156));
 *     modify(hues, 'Coral', slot => slot.clear());
 */
export function modify<K, V extends Present, R>(
  store: KeyedStore<K, V>,
  key: K,
  fn: (slot: Box<V>) => R
): R {
  const found = store.get(key);
  const wasPresent = found !== undefined;

  return withWriteBack<Box<V>, R>(
    Box.from(found),
    slot => {
      const value = slot.get();
      if (value !== undefined) {
        store.set(key, value);
      } else if (wasPresent) {
        store.delete(key);
      }
    },
    fn
  );
}
