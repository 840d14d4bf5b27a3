/**
 * Configuration & Environment Management
 *
 * Settings for logging and model validation, loaded from a JSON file and the
 * environment.
 */

export {
  Config,
  getConfig,
  setConfig,
  loadConfig,
  type ConfigOptions,
  type OrmConfig,
} from './config.ts';
