export {
  loadConfiguration,
  loadConfigFromEnv,
  loadConfigFile,
  parseConfigYaml,
  mergeLayers,
  buildConfiguration,
  formatConfigError,
  type LoadConfigurationOptions,
} from './loader.js';
export { configurationSchema, configFileSchema, CONFIG_DEFAULTS } from './types.js';
export type { Configuration, ConfigLayer, SharedConfigLayer, ConfigFile } from './types.js';
