/**
 * Sheetgrid Engine - Core Module Exports
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Geometry
export * from './geometry/index.js';

// Matrix and row/column views
export * from './matrix/index.js';

// Collaborators
export * from './reference/index.js';
export * from './formatting/index.js';
export * from './validation/index.js';
export * from './book/index.js';
