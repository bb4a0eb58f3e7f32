/**
 * Schema module — single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 */

export * from './options.js';
export * from './publish.js';
export * from './jsonOutput.js';
