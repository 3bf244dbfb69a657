/**
 * Config module exports.
 */

export type { EngineConfig, EngineConfigFile } from './config-schema.js';
export {
  DEFAULT_CONFIG,
  CONFIG_FILE_VERSION,
  EngineConfigSchema,
  EngineConfigFileSchema,
} from './config-schema.js';
export { ConfigLoader, CONFIG_FILE_NAME, createConfigLoader, loadConfig } from './config-loader.js';
