/**
 * @opbind/types - Type definitions for the opbind binding generator
 */

// Registry handles
export type { OpHandle } from './branded.js';
export { brandHandle } from './branded.js';

// Native registry capability and snapshot format
export * from './registry.js';

// Function / argument descriptors
export * from './descriptors.js';

// Surfaces and splice targets
export * from './surfaces.js';

// Ownership manifest
export * from './ownership.js';
