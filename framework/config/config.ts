/**
 * Configuration Management
 *
 * Loads and manages application configuration from multiple sources.
 */

import { readFile } from 'node:fs/promises';
import type { BoolCoercionSource } from '../orm/coercers.ts';
import type { LogLevel } from '../telemetry/logger.ts';

export interface OrmConfig {
  /** Attribute names starting with this prefix are never validated */
  reservedPrefix: string;
  /** Which side of a bool/string pair the bool coercer reads */
  boolCoercion: BoolCoercionSource;
}

export interface ConfigOptions {
  env?: string;
  debug?: boolean;
  logLevel?: LogLevel;
  logFormat?: 'json' | 'pretty';
  orm?: Partial<OrmConfig>;
  [key: string]: unknown;
}

const DEFAULT_CONFIG: ConfigOptions = {
  env: 'development',
  debug: false,
  logLevel: 'info',
  orm: {
    reservedPrefix: '_',
    boolCoercion: 'value',
  },
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isBoolCoercionSource(value: unknown): value is BoolCoercionSource {
  return value === 'value' || value === 'key';
}

/**
 * Configuration manager
 */
export class Config {
  private config: Record<string, unknown>;

  constructor(options: ConfigOptions | Record<string, unknown> = {}) {
    this.config = this.mergeConfig(DEFAULT_CONFIG, options);
  }

  /**
   * Get a configuration value by dot path
   */
  get(key: string, defaultValue?: unknown): unknown {
    const value = this.getNestedValue(this.config, key);
    return value ?? defaultValue;
  }

  /**
   * Set a configuration value
   */
  set(key: string, value: unknown): void {
    this.setNestedValue(this.config, key, value);
  }

  /**
   * Check if a configuration key exists
   */
  has(key: string): boolean {
    return this.getNestedValue(this.config, key) !== undefined;
  }

  /**
   * Get all configuration
   */
  all(): Record<string, unknown> {
    return { ...this.config };
  }

  /**
   * Get environment-specific configuration
   */
  forEnv(env: string): Record<string, unknown> {
    const envConfig = this.config[env];
    if (isRecord(envConfig)) {
      return this.mergeConfig(this.config, envConfig);
    }
    return this.config;
  }

  /**
   * Model validation settings, with invalid entries replaced by defaults
   */
  orm(): OrmConfig {
    const prefix = this.get('orm.reservedPrefix');
    const boolCoercion = this.get('orm.boolCoercion');
    return {
      reservedPrefix: typeof prefix === 'string' ? prefix : '_',
      boolCoercion: isBoolCoercionSource(boolCoercion) ? boolCoercion : 'value',
    };
  }

  logLevel(): LogLevel {
    const level = this.get('logLevel');
    return isLogLevel(level) ? level : 'info';
  }

  /**
   * Merge configurations
   */
  private mergeConfig(
    base: Record<string, unknown>,
    override: Record<string, unknown>
  ): Record<string, unknown> {
    const result: Record<string, unknown> = { ...base };

    for (const [key, value] of Object.entries(override)) {
      if (value !== undefined) {
        if (isRecord(value)) {
          const current = base[key];
          result[key] = this.mergeConfig(isRecord(current) ? current : {}, value);
        } else {
          result[key] = value;
        }
      }
    }

    return result;
  }

  /**
   * Get nested value by path
   */
  private getNestedValue(obj: Record<string, unknown>, path: string): unknown {
    let current: unknown = obj;
    for (const part of path.split('.')) {
      if (!isRecord(current)) return undefined;
      current = current[part];
    }
    return current;
  }

  /**
   * Set nested value by path
   */
  private setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
    const parts = path.split('.');
    const last = parts.pop() ?? path;
    let current = obj;

    for (const part of parts) {
      const next = current[part];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }

    current[last] = value;
  }
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf8'));
}

/**
 * Load configuration from a JSON file and the environment. An explicit path
 * must exist; the default locations are skipped when missing.
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  let fileConfig: Record<string, unknown> = {};

  if (configPath) {
    const parsed = await readJson(configPath);
    if (isRecord(parsed)) fileConfig = parsed;
  } else {
    for (const path of ['./config/app.json', './config.json']) {
      let parsed: unknown;
      try {
        parsed = await readJson(path);
      } catch (error) {
        if (isMissingFile(error)) continue;
        throw error;
      }
      if (isRecord(parsed)) {
        fileConfig = parsed;
        break;
      }
    }
  }

  const env = process.env;
  const envConfig: Record<string, unknown> = {
    env: env.NODE_ENV,
    debug: env.DEBUG === undefined ? undefined : env.DEBUG === 'true',
    logLevel: env.LOG_LEVEL,
    'orm.reservedPrefix': env.ORM_RESERVED_PREFIX,
    'orm.boolCoercion': env.ORM_BOOL_COERCION,
  };

  const config = new Config(fileConfig);
  for (const [key, value] of Object.entries(envConfig)) {
    if (value !== undefined) {
      config.set(key, value);
    }
  }

  return config;
}

// Default config instance
let defaultConfig: Config | null = null;

/**
 * Get the default config instance
 */
export function getConfig(): Config {
  if (!defaultConfig) {
    defaultConfig = new Config();
  }
  return defaultConfig;
}

/**
 * Replace the default config instance
 */
export function setConfig(config: Config): void {
  defaultConfig = config;
}
