/**
 * Core constants
 */

// Marker for an empty Box slot; also the hole left while a value is moved out
export const EMPTY = Symbol('EMPTY');
