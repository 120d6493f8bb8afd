/**
 * Engine configuration module.
 *
 * @module engine/config
 */

export { DEFAULT_CONFIG, mergeWithDefaults } from './defaults.js';
export { loadConfigFromEnv, parseSize } from './env.js';
