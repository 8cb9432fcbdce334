/**
 * Centralized Configuration Module
 *
 * Type-safe, validated configuration for Spaced Review, loaded from
 * environment variables.
 *
 * Features:
 * - Type-safe configuration object inferred from a Zod schema
 * - Environment-aware validation (stricter in production)
 * - Defaults for every value, so development needs no setup
 *
 * Usage:
 *   import { getConfig, validateConfig } from './config';
 *
 *   const config = getConfig();
 *   validateConfig(config);
 *   console.log(config.server.port);
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

const configSchema = z.object({
  // Server configuration
  server: z.object({
    port: z.number().int().positive().max(65535).default(3000),
    host: z.string().min(1).default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  // Database configuration
  database: z.object({
    path: z.string().min(1).default('spaced-review.db'),
  }),

  // Logging configuration
  logging: z.object({
    requests: z.boolean().default(true),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

export type Environment = Record<string, string | undefined>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the value is missing; NaN is passed through so the
 * schema reports it.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

/**
 * Parse a boolean flag. Accepts true/false, 1/0, yes/no.
 */
function parseBooleanOrUndefined(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  return undefined;
}

/**
 * Builds the raw (unvalidated) configuration object from an environment.
 */
function loadFromEnvironment(env: Environment): unknown {
  return {
    server: {
      port: parseIntOrUndefined(env.PORT),
      host: env.HOST,
      nodeEnv: env.NODE_ENV,
    },
    database: {
      path: env.DATABASE_PATH,
    },
    logging: {
      requests: parseBooleanOrUndefined(env.LOG_REQUESTS),
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/** Environment variable behind each configuration path */
const ENV_VAR_NAMES: Record<string, string> = {
  'server.port': 'PORT',
  'server.host': 'HOST',
  'server.nodeEnv': 'NODE_ENV',
  'database.path': 'DATABASE_PATH',
  'logging.requests': 'LOG_REQUESTS',
};

/**
 * Loads and parses configuration from an environment.
 *
 * @param env - Variables to read (default: process.env)
 * @throws {ConfigValidationError} If a variable has an unusable value
 *
 * @example
 * ```typescript
 * const config = loadConfig({ PORT: '8080', DATABASE_PATH: ':memory:' });
 * config.server.port; // 8080
 * ```
 */
export function loadConfig(env: Environment = process.env): Config {
  const parseResult = configSchema.safeParse(loadFromEnvironment(env));

  if (!parseResult.success) {
    const invalidVars = parseResult.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return { name: ENV_VAR_NAMES[path] ?? path, reason: issue.message };
    });
    const details = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
    throw new ConfigValidationError(`Invalid configuration: ${details}`, [], invalidVars);
  }

  return parseResult.data;
}

/**
 * Validates production requirements on a parsed configuration.
 *
 * In production the database must be a file: an in-memory database would
 * lose every deck and review record on restart.
 *
 * @throws {ConfigValidationError} If a production requirement is not met
 */
export function validateConfig(config: Config): void {
  const invalidVars: { name: string; reason: string }[] = [];

  if (config.server.nodeEnv === 'production' && config.database.path === ':memory:') {
    invalidVars.push({
      name: 'DATABASE_PATH',
      reason: 'an in-memory database cannot be used in production',
    });
  }

  if (invalidVars.length > 0) {
    const details = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
    throw new ConfigValidationError(`Invalid configuration: ${details}`, [], invalidVars);
  }
}

// =============================================================================
// Configuration Export
// =============================================================================

let cachedConfig: Config | null = null;

/**
 * The process-wide configuration, loaded from process.env on first use.
 */
export function getConfig(): Config {
  if (cachedConfig === null) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Helper function to check if we're running in production mode.
 */
export function isProduction(config: Config = getConfig()): boolean {
  return config.server.nodeEnv === 'production';
}
