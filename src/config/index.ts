/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
} from "./env.js";

export { ConfigError } from "./env.js";

// Re-export safety policy module
export * from "./safety/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** Path to the topic dataset */
  readonly topicsPath: string;
  /** Directory that topic visuals resolve against */
  readonly imagesDir: string;
  /** How many scanner warnings the developer panel shows */
  readonly devWarningLimit: number;
  /** Write log entries to output/logs as well as the console */
  readonly logToFile: boolean;
}

/**
 * Load and validate application configuration.
 * Fails fast if a variable is present but malformed.
 */
function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName: optionalEnv("APP_NAME", "claritycare"),
    topicsPath: optionalEnv("TOPICS_PATH", "topics/sample-topics.json"),
    imagesDir: optionalEnv("IMAGES_DIR", "assets/images"),
    devWarningLimit: optionalEnvInt("DEV_WARNING_LIMIT", 8, 1),
    logToFile: optionalEnvBool("LOG_TO_FILE", true),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate the values that have a closed set of options.
 * Call this at application startup to fail fast.
 */
export function validateConfig(): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`,
      "NODE_ENV"
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`,
      "LOG_LEVEL"
    );
  }
}

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type ConfiguredLogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is ConfiguredLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Configured log level, falling back to "info" when the value is unknown.
 */
export function configuredLogLevel(): ConfiguredLogLevel {
  return isLogLevel(config.logLevel) ? config.logLevel : "info";
}
