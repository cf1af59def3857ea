/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvPath,
  type EnvSource,
} from "./env.js";
import type { LogLevel } from "../logging/logger.js";

export { ConfigError, type EnvSource } from "./env.js";
export * from "./quality/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** SQLite database file */
  readonly databasePath: string;
  /** Directory for JSON and CSV exports */
  readonly exportDir: string;
  /** Directory for log files */
  readonly logDir: string;
  /** Sectors, dimensions and technologies seeded on init */
  readonly referenceDataPath: string;
  /** Optional JSON overlay for the quality configuration */
  readonly qualityConfigPath: string | undefined;
}

/**
 * Build configuration from environment variables.
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development", env),
    debug: optionalEnvBool("DEBUG", false, env),
    logLevel: optionalEnv("LOG_LEVEL", "info", env),
    appName: optionalEnv("APP_NAME", "robotics-intel", env),
    databasePath: optionalEnv("DATABASE_PATH", "data/robotics.db", env),
    exportDir: optionalEnv("EXPORT_PATH", "data/exports", env),
    logDir: optionalEnv("LOG_DIR", "data/logs", env),
    referenceDataPath: optionalEnv("REFERENCE_DATA_PATH", "config/reference-data.json", env),
    qualityConfigPath: optionalEnvPath("QUALITY_CONFIG_PATH", env),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Validate configuration and return the effective log level.
 * Call this at application startup to fail fast.
 */
export function validateConfig(cfg: AppConfig = config): LogLevel {
  if (!ENVIRONMENTS.some((env) => env === cfg.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${cfg.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(cfg.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${cfg.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  return cfg.debug ? "debug" : cfg.logLevel;
}
