// Types
export * from './types/index.js';

// Errors
export * from './errors.js';

// Ambient infrastructure
export * from './config/index.js';
export * from './logging/index.js';
export * from './concurrency/index.js';
export * from './storage/index.js';

// Understanding
export * from './embeddings/index.js';
export * from './semantic/index.js';
export * from './extraction/index.js';
export * from './intent/index.js';
export * from './sentiment/index.js';
export * from './decomposition/index.js';

// Memory and dispatch
export * from './memory/index.js';
export * from './routing/index.js';
export * from './session/index.js';

// Facade
export * from './core/index.js';
