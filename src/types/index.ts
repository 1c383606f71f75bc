/**
 * Barrel export for all shared types.
 */
export { DEFAULT_CONFIG } from './config.js';
export type { ExplorerConfig, LogLevel } from './config.js';
export { ReaderType } from './reader.js';
export type { CatalogDescriptor, BasePreparedQuery, PreparedQuery } from './reader.js';
