export { loadConfig, type ConfigLoadResult, type ConfigLoadOptions } from './config-manager.js';
export {
  UserConfigSchema,
  LOG_LEVELS,
  type ValidatedUserConfig,
  type ResolvedConfig,
} from './schema.js';
