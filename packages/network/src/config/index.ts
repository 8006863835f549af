/**
 * Configuration Module
 *
 * Exports the YAML network config loader and its types.
 */

export { NetworkConfigLoader, loadNetworkConfig, createPerceptron } from './loader.js';
export type { NetworkConfigLoaderOptions } from './loader.js';
export { NetworkConfigSchema, DEFAULT_SEARCH_PATHS } from './types.js';
export type { NetworkConfig } from './types.js';
export { ConfigLoadError, ConfigValidationError } from './errors.js';
