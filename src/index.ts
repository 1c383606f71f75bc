export * from './types/index.js';
export * from './rdf/namespaces.js';
export * from './fields/index.js';
export * from './records/index.js';
export * from './readers/index.js';
export * from './catalogs/index.js';
export { defaultDataDir, getConfig, resolveConfig, setConfig } from './utils/config.js';
export { getLogger, initLogger } from './utils/logger.js';
export { HttpClient, HttpError, createHttpClient, getHttpClient } from './utils/http-client.js';
