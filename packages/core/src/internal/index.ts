/**
 * Internal modules barrel export
 */

// Errors
export { IndexOutOfBoundsError } from './errors';

// Box
export { Box, modifyIfPresent } from './box';

// Keyed
export { modifyOrInsert, modify } from './keyed';

// Indexed
export { modifyAt } from './indexed';

// Types
export type { Inout, Present, KeyedStore, MutableSequence } from './types';
