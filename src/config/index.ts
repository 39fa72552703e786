/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  maybeEnv,
  optionalEnv,
  optionalEnvBool,
  optionalEnvEnum,
} from "./env.js";
import type { LogLevel } from "../logging/index.js";

export { ConfigError, requireEnv } from "./env.js";

// Re-export engine configuration module
export * from "./engine/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: (typeof ENVIRONMENTS)[number];
  /** Log level */
  readonly logLevel: LogLevel;
  /** Directory for log files */
  readonly logDir: string;
  /** Append log lines to a file in logDir */
  readonly logToFile: boolean;
  /** Application name */
  readonly appName: string;
  /** Directory used by the file-backed document store */
  readonly storeDir: string;
  /** Optional JSON file with engine configuration overrides */
  readonly engineConfigPath?: string;
  readonly gemini: {
    /** Unset until a command actually needs the model */
    readonly apiKey?: string;
    readonly model: string;
  };
}

/**
 * Load and validate application configuration.
 * Fails fast on malformed values.
 */
function loadConfig(): AppConfig {
  return {
    env: optionalEnvEnum("NODE_ENV", ENVIRONMENTS, "development"),
    logLevel: optionalEnvEnum("LOG_LEVEL", LOG_LEVELS, "info"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool("LOG_TO_FILE", true),
    appName: optionalEnv("APP_NAME", "topic-notes"),
    storeDir: optionalEnv("NOTES_STORE_DIR", "output/store"),
    engineConfigPath: maybeEnv("ENGINE_CONFIG"),
    gemini: {
      apiKey: maybeEnv("GEMINI_API_KEY"),
      model: optionalEnv("GEMINI_MODEL", "gemini-1.5-pro"),
    },
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Return the Gemini API key or fail with a ConfigError naming the variable.
 */
export function requireGeminiApiKey(): string {
  if (config.gemini.apiKey === undefined) {
    throw new ConfigError("Missing required environment variable: GEMINI_API_KEY");
  }
  return config.gemini.apiKey;
}
