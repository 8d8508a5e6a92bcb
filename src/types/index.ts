export * from './intent.js';
export * from './sentiment.js';
export * from './task.js';
export * from './memory.js';
export * from './embeddings.js';
