/**
 * In-place modify accessors for Box, keyed stores and sequences
 *
 * - modifyIfPresent(box, fn)           → hole/restore on a zero-or-one Box
 * - modifyOrInsert(map, key, def, fn)  → access-or-insert, always written back
 * - modify(map, key, fn)               → presence-aware upsert / delete
 * - modifyAt(seq, index, fn)           → bounds-checked direct element access
 *
 * Every closure gets the container's own value, never a copy, and the
 * container is consistent again before the closure's result or error
 * reaches the caller.
 */

// =====================================================
// Box
// =====================================================

export { Box, modifyIfPresent } from './internal';

// =====================================================
// Keyed stores (Map, WeakMap)
// =====================================================

export { modifyOrInsert, modify } from './internal';

// =====================================================
// Sequences (arrays, typed arrays)
// =====================================================

export { modifyAt, IndexOutOfBoundsError } from './internal';

// =====================================================
// Types
// =====================================================

export type { Inout, KeyedStore, MutableSequence, Present } from './internal';
