export { CoreConfigSchema, DEFAULT_CORE_CONFIG } from './schema.js';
export type { CoreConfig } from './schema.js';
export { readCoreConfig, validateCoreConfig, DEFAULT_CONFIG_PATH } from './reader.js';
