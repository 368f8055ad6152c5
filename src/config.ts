/**
 * Service configuration.
 *
 * Built from environment variables over typed defaults. loadConfig()
 * collects every unparseable or out-of-range value and throws them
 * together as one ConfigError.
 */

import { BACKOFF_STRATEGIES, BackoffStrategy } from './engine/retry';
import { DEFAULT_ENGINE_CONFIG, EngineConfig } from './engine/execution-engine';
import { LogLevel, parseLogLevel } from './logger';
import { VALIDATION_MODES, ValidationMode } from './validation/validation-logic';

export type StorageKind = 'memory' | 'sqlite';

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  storage: StorageKind;
  /** Database file used when storage is sqlite. */
  sqlitePath: string;
  validationMode: ValidationMode;
  /** Fields the document check requires on a subject record. */
  requiredFields: string[];
  engine: EngineConfig;
  /** JSON file of subject records seeded into the in-memory record store. */
  recordsFile?: string;
  webhook?: {
    url: string;
    signingSecret?: string;
  };
}

export const DEFAULT_CONFIG: Readonly<AppConfig> = {
  port: 5000,
  logLevel: LogLevel.Info,
  storage: 'memory',
  sqlitePath: 'data/validation.db',
  validationMode: 'existence',
  requiredFields: ['email'],
  engine: { ...DEFAULT_ENGINE_CONFIG },
};

/** Validation result for a configuration. */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export class ConfigError extends Error {
  constructor(public readonly errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

/** Largest delay Node's timers accept; longer ones fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Build configuration from environment variables.
 *
 * @throws ConfigError listing every problem found.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];

  const int = (name: string, fallback: number): number => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value)) {
      problems.push(`${name} must be an integer, got "${raw}"`);
      return fallback;
    }
    return value;
  };

  const oneOf = <T extends string>(name: string, allowed: readonly T[], fallback: T): T => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const match = allowed.find((candidate) => candidate === raw.trim().toLowerCase());
    if (!match) {
      problems.push(`${name} must be one of ${allowed.join(', ')}, got "${raw}"`);
      return fallback;
    }
    return match;
  };

  let logLevel = DEFAULT_CONFIG.logLevel;
  if (env.LOG_LEVEL) {
    const parsed = parseLogLevel(env.LOG_LEVEL);
    if (parsed) logLevel = parsed;
    else problems.push(`LOG_LEVEL must be one of ${Object.values(LogLevel).join(', ')}, got "${env.LOG_LEVEL}"`);
  }

  const storage = oneOf<StorageKind>('VALIDATION_STORAGE', ['memory', 'sqlite'], DEFAULT_CONFIG.storage);
  const backoffStrategy = oneOf<BackoffStrategy>(
    'VALIDATION_BACKOFF',
    BACKOFF_STRATEGIES,
    DEFAULT_CONFIG.engine.backoffStrategy,
  );

  const requiredFields = env.VALIDATION_REQUIRED_FIELDS !== undefined
    ? env.VALIDATION_REQUIRED_FIELDS.split(',').map((f) => f.trim()).filter((f) => f.length > 0)
    : [...DEFAULT_CONFIG.requiredFields];

  const config: AppConfig = {
    port: int('PORT', DEFAULT_CONFIG.port),
    logLevel,
    storage,
    sqlitePath: env.VALIDATION_DB_PATH || DEFAULT_CONFIG.sqlitePath,
    validationMode: oneOf('VALIDATION_MODE', VALIDATION_MODES, DEFAULT_CONFIG.validationMode),
    requiredFields,
    engine: {
      maxConcurrency: int('VALIDATION_MAX_CONCURRENCY', DEFAULT_CONFIG.engine.maxConcurrency),
      timeoutMs: int('VALIDATION_TIMEOUT_MS', DEFAULT_CONFIG.engine.timeoutMs),
      maxAttempts: int('VALIDATION_MAX_ATTEMPTS', DEFAULT_CONFIG.engine.maxAttempts),
      backoffStrategy,
      backoffBaseMs: int('VALIDATION_BACKOFF_BASE_MS', DEFAULT_CONFIG.engine.backoffBaseMs),
      backoffMaxMs: int('VALIDATION_BACKOFF_MAX_MS', DEFAULT_CONFIG.engine.backoffMaxMs),
    },
  };

  if (env.VALIDATION_RECORDS_FILE) config.recordsFile = env.VALIDATION_RECORDS_FILE;
  if (env.VALIDATION_WEBHOOK_URL) {
    config.webhook = { url: env.VALIDATION_WEBHOOK_URL };
    if (env.VALIDATION_WEBHOOK_SECRET) config.webhook.signingSecret = env.VALIDATION_WEBHOOK_SECRET;
  }

  const result = validateConfig(config);
  problems.push(...result.errors);
  if (problems.length > 0) throw new ConfigError(problems);
  return config;
}

/** Check a configuration for out-of-range or unparseable values. */
export function validateConfig(config: AppConfig): ConfigValidationResult {
  const errors: string[] = [];

  if (config.port < 0 || config.port > 65535) {
    errors.push(`port must be between 0 and 65535, got ${config.port}`);
  }
  if (config.engine.maxConcurrency < 1) {
    errors.push(`engine.maxConcurrency must be at least 1, got ${config.engine.maxConcurrency}`);
  }
  if (config.engine.maxAttempts < 1) {
    errors.push(`engine.maxAttempts must be at least 1, got ${config.engine.maxAttempts}`);
  }
  if (config.engine.timeoutMs <= 0) {
    errors.push(`engine.timeoutMs must be positive, got ${config.engine.timeoutMs}`);
  }
  if (config.engine.backoffBaseMs < 0) {
    errors.push(`engine.backoffBaseMs must not be negative, got ${config.engine.backoffBaseMs}`);
  }
  if (config.engine.backoffMaxMs < config.engine.backoffBaseMs) {
    errors.push('engine.backoffMaxMs must not be below engine.backoffBaseMs');
  }
  for (const key of ['timeoutMs', 'backoffBaseMs', 'backoffMaxMs'] as const) {
    if (config.engine[key] > MAX_TIMER_MS) {
      errors.push(`engine.${key} must not exceed ${MAX_TIMER_MS}, got ${config.engine[key]}`);
    }
  }
  if (config.validationMode === 'document' && config.requiredFields.length === 0) {
    errors.push('document validation needs at least one required field');
  }
  if (config.recordsFile && config.storage === 'sqlite') {
    errors.push('recordsFile seeds the in-memory record store and cannot be combined with sqlite storage');
  }

  return { valid: errors.length === 0, errors };
}
