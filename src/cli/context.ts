/**
 * Per-invocation setup shared by the CLIs: configuration, run ID, logger,
 * quality configuration and an open repository.
 */

import { loadConfig, validateConfig, type AppConfig } from "../config/index.js";
import { loadQualityConfig, loadQualityConfigFile } from "../config/quality/loader.js";
import type { QualityConfig } from "../config/quality/schema.js";
import { openDatabase } from "../db/connection.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { initRunId } from "../logging/run-id.js";
import { IntelligenceRepository } from "../repository/repository.js";
import { ValidationEngine } from "../validation/engine.js";

export interface CliContext {
  config: AppConfig;
  quality: Readonly<QualityConfig>;
  runId: string;
  logger: Logger;
  repo: IntelligenceRepository;
  /** Shared by the repository and any workflow built on it */
  engine: ValidationEngine;
  close(): void;
}

export interface CliContextOptions {
  /** CLI name, bound to every log line */
  command: string;
  /** Echo log lines to the console at debug level */
  verbose?: boolean;
}

/**
 * @throws ConfigError on invalid environment settings
 * @throws QualityConfigError on an invalid quality configuration file
 */
export function openCliContext(options: CliContextOptions): CliContext {
  const config = loadConfig();
  const level = validateConfig(config);
  const runId = initRunId();

  const logger = createLogger({
    level: options.verbose ? "debug" : level,
    logDir: config.logDir,
    logFile: `${config.appName}.log`,
    console: options.verbose ?? false,
    bindings: { command: options.command },
  });

  const quality =
    config.qualityConfigPath !== undefined
      ? loadQualityConfigFile(config.qualityConfigPath)
      : loadQualityConfig();

  const engine = new ValidationEngine({ config: quality });
  const repo = new IntelligenceRepository(openDatabase(config.databasePath), { logger, engine });
  logger.debug("CLI context ready", { runId, databasePath: config.databasePath, env: config.env });

  return {
    config,
    quality,
    runId,
    logger,
    repo,
    engine,
    close: () => repo.close(),
  };
}
