/**
 * Application configuration.
 *
 * Two layers:
 *   - process settings from the environment (this file)
 *   - the pipeline configuration JSON, whose path comes from PIPELINE_CONFIG
 *     (./pipeline/)
 */

import { isLogLevel, type LogLevel } from "../logging/logger.js";
import { optionalEnv, optionalEnvBool, ConfigError } from "./env.js";

export { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";

export * from "./pipeline/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  readonly debug: boolean;
  readonly logLevel: string;
  readonly appName: string;
  /** Path to the pipeline configuration JSON */
  readonly pipelineConfigPath: string;
}

const ENVIRONMENTS = ["development", "production", "test"];

/**
 * Read application configuration from the environment.
 *
 * @throws ConfigError when DEBUG is not a recognizable boolean
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName: optionalEnv("APP_NAME", "study-plot-pipeline"),
    pipelineConfigPath: optionalEnv("PIPELINE_CONFIG", "config/pipeline.json"),
  };
}

/**
 * Fail fast on invalid settings. Call at startup, before any run begins.
 */
export function validateConfig(config: AppConfig): void {
  if (!ENVIRONMENTS.includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}

/**
 * Effective log level: DEBUG=true forces "debug".
 */
export function resolveLogLevel(config: AppConfig): LogLevel {
  if (config.debug) {
    return "debug";
  }
  return isLogLevel(config.logLevel) ? config.logLevel : "info";
}
