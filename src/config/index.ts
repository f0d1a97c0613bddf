export {
  loadConfig,
  mergeSettings,
  validateConfig,
  readEnvironmentConfig,
  type ConfigLoadResult,
  type ConfigLoadOptions,
} from './config-manager.js';
export { WorkflowConfigSchema, DEFAULT_SETTINGS, type WorkflowConfig, type Settings } from './schema.js';
