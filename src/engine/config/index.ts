/**
 * Engine configuration module.
 *
 * Exports default configuration values and utilities for
 * managing engine configuration.
 *
 * @module engine/config
 */

export { DEFAULT_CONFIG, mergeWithDefaults, loadConfigFromEnv } from './defaults.js';
