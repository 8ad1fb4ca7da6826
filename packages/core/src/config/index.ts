/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  resolveConfigPath,
  validateConfig,
  validateVersion,
  CONFIG_FILE_NAMES,
  DEFAULT_PROFILES,
} from './ConfigLoader.js';
export type { OpbindConfig, JobConfig } from './ConfigLoader.js';
