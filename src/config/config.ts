import { existsSync, statSync } from 'fs';
import { resolve } from 'path';
import type { AppConfig, LoggingConfig } from '../types/index.js';
import { CollisionPolicy, isCollisionPolicy } from '../types/index.js';
import { ConfigurationError, NotFoundError } from '../lib/errors.js';

function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${key}`, { key });
  }
  return value;
}

function getOptionalEnv(key: string): string | null {
  const value = process.env[key];
  return value === undefined || value === '' ? null : value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const num = parseInt(value, 10);
  if (isNaN(num) || num < 0) {
    throw new ConfigurationError(`Environment variable ${key} must be a non-negative number, got: ${value}`, {
      key,
      value,
    });
  }
  return num;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

const LOG_LEVELS: ReadonlyArray<LoggingConfig['level']> = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string): value is LoggingConfig['level'] {
  return LOG_LEVELS.some((level) => level === value);
}

export function loadConfig(): AppConfig {
  // Organizer Configuration
  const sourceDir = resolve(getEnv('SOURCE_DIR'));

  if (!existsSync(sourceDir) || !statSync(sourceDir).isDirectory()) {
    throw new NotFoundError(`Source directory does not exist: ${sourceDir}`, { sourceDir });
  }

  const rulesPath = getOptionalEnv('CATEGORY_RULES_PATH');
  const collisionPolicy = getEnv('COLLISION_POLICY', CollisionPolicy.RENAME).toLowerCase();

  if (!isCollisionPolicy(collisionPolicy)) {
    throw new ConfigurationError(
      `Invalid COLLISION_POLICY: ${collisionPolicy}. Must be one of: ${Object.values(CollisionPolicy).join(', ')}`,
      { collisionPolicy }
    );
  }

  const organizer = {
    sourceDir,
    targetDir: resolve(getEnv('TARGET_DIR')),
    categoryRulesPath: rulesPath === null ? null : resolve(rulesPath),
    collisionPolicy,
    watch: getEnvBoolean('WATCH', true),
  };

  // Monitoring Configuration
  const monitoring = {
    watchPath: sourceDir,
    stabilityThreshold: getEnvNumber('STABILITY_THRESHOLD', 2000),
    pollInterval: getEnvNumber('POLL_INTERVAL', 100),
    ignoreHidden: getEnvBoolean('IGNORE_HIDDEN', true),
  };

  // Storage Configuration
  const storage = {
    operationLogPath: resolve(getEnv('OPERATION_LOG_PATH', './operations.log')),
    encryptionKeyPath: resolve(getEnv('ENCRYPTION_KEY_PATH', './encryption.key')),
  };

  const duplicates = {
    confirmContent: getEnvBoolean('CONFIRM_DUPLICATES', true),
  };

  // Logging Configuration
  const level = getEnv('LOG_LEVEL', 'info').toLowerCase();

  if (!isLogLevel(level)) {
    throw new ConfigurationError(`Invalid LOG_LEVEL: ${level}. Must be one of: ${LOG_LEVELS.join(', ')}`, {
      level,
    });
  }

  const logging = {
    level,
    pretty: getEnvBoolean('LOG_PRETTY', process.env.NODE_ENV !== 'production'),
  };

  return {
    organizer,
    monitoring,
    storage,
    duplicates,
    logging,
  };
}

// Export singleton config instance
let config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

// For testing: reset config
export function resetConfig(): void {
  config = null;
}
