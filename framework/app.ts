/**
 * Bootstrap
 *
 * Applies loaded configuration to the process-wide defaults: the logger and
 * the coercer registry behind the shared type validator. Call once at startup,
 * before any model is constructed.
 */

import { Config, loadConfig, setConfig, type ConfigOptions } from './config/config.ts';
import { createCoercerRegistry } from './orm/coercers.ts';
import { TypeValidator, setTypeValidator } from './orm/type_validator.ts';
import { createLogger, setLogger } from './telemetry/logger.ts';

export interface BootstrapOptions {
  config?: ConfigOptions;
  configPath?: string;
}

/**
 * Install `config` as the default configuration and rebuild the shared
 * logger and type validator from it
 */
export function configure(config: Config): TypeValidator {
  setConfig(config);

  const logger = createLogger(config);
  setLogger(logger);

  const validator = new TypeValidator(createCoercerRegistry(config.orm()));
  setTypeValidator(validator);

  logger.debug('Model engine configured', { ...config.orm() });
  return validator;
}

/**
 * Load configuration (file and environment) unless given inline, then configure
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<Config> {
  const config = options.config ? new Config(options.config) : await loadConfig(options.configPath);
  configure(config);
  return config;
}
