import dotenv from "dotenv";
import type { Credentials } from "../../domain/entities/Credentials.js";
import type { LogLevel } from "../../domain/ports/ILogger.js";

export const DEFAULT_SERVICE_URL = "https://gateway.watsonplatform.net/conversation/api";
export const DEFAULT_VERSION = "2017-05-26";
export const DEFAULT_TIMEOUT_MS = 30_000;

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export interface AppConfig {
  service: {
    url: string;
    /** API version date, YYYY-MM-DD */
    version: string;
    credentials?: Credentials;
    timeoutMs: number;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
}

type Environment = Record<string, string | undefined>;

function getEnvOrDefault(env: Environment, key: string, defaultValue: string): string {
  const value = env[key];
  return value ? value : defaultValue;
}

function getEnvNumber(env: Environment, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvLogLevel(env: Environment, key: string, defaultValue: LogLevel): LogLevel {
  const value = env[key]?.toLowerCase();
  return LOG_LEVELS.find((level) => level === value) ?? defaultValue;
}

function getEnvBoolean(env: Environment, key: string): boolean {
  const value = env[key]?.toLowerCase();
  return value === "true" || value === "1";
}

function readCredentials(env: Environment): Credentials | undefined {
  const token = env.CONVERSATION_API_TOKEN;
  if (token) {
    return { type: "bearer", token };
  }

  const username = env.CONVERSATION_USERNAME;
  const password = env.CONVERSATION_PASSWORD;
  if (username && password) {
    return { type: "basic", username, password };
  }
  return undefined;
}

/**
 * Load configuration from environment variables.
 *
 * Without an explicit environment, `.env` is loaded into `process.env` first.
 */
export function loadConfig(env?: Environment): AppConfig {
  let source: Environment;
  if (env) {
    source = env;
  } else {
    dotenv.config();
    source = process.env;
  }

  const credentials = readCredentials(source);

  return {
    service: {
      url: getEnvOrDefault(source, "CONVERSATION_URL", DEFAULT_SERVICE_URL),
      version: getEnvOrDefault(source, "CONVERSATION_VERSION", DEFAULT_VERSION),
      ...(credentials && { credentials }),
      timeoutMs: getEnvNumber(source, "CONVERSATION_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
    },
    logging: {
      level: getEnvLogLevel(source, "LOG_LEVEL", "warn"),
      pretty: getEnvBoolean(source, "LOG_PRETTY"),
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): void {
  if (!config.service.url.startsWith("http://") && !config.service.url.startsWith("https://")) {
    throw new Error("CONVERSATION_URL must start with http:// or https://");
  }

  if (!/^\d{4}-\d{2}-\d{2}$/.test(config.service.version)) {
    throw new Error("CONVERSATION_VERSION must be a date in YYYY-MM-DD form");
  }

  if (!config.service.credentials) {
    throw new Error(
      "Missing credentials. Set CONVERSATION_API_TOKEN, or CONVERSATION_USERNAME and CONVERSATION_PASSWORD"
    );
  }

  if (config.service.timeoutMs < 0) {
    throw new Error("CONVERSATION_TIMEOUT_MS must not be negative");
  }
}
