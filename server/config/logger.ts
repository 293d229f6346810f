import pino from "pino";
import { Environment, resolveEnvironment } from "../types/environment";

/**
 * Logger Configuration
 *
 * Pino logger for the engine. In development it pretty-prints through
 * pino-pretty; elsewhere it emits JSON lines suitable for log aggregation.
 * LOG_LEVEL overrides the per-environment default.
 */

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

// Define log levels for different environments
const logLevels: Record<Environment, LogLevel> = {
  [Environment.Development]: "debug",
  [Environment.Test]: "error",
  [Environment.Production]: "info",
};

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function resolveLogLevel(env: Environment, override?: string): LogLevel {
  const requested = override?.trim().toLowerCase();
  if (requested && isLogLevel(requested)) {
    return requested;
  }
  return logLevels[env];
}

const environment = resolveEnvironment(process.env.NODE_ENV);

// Base configuration for all environments
const baseConfig: pino.LoggerOptions = {
  name: "skillgap-engine",
  level: resolveLogLevel(environment, process.env.LOG_LEVEL),
  redact: {
    paths: ["*.password", "*.apiKey", "*.secret", "*.credentials"],
    censor: "[REDACTED]",
  },
};

// Development-specific configuration with pretty printing
const developmentConfig: pino.LoggerOptions = {
  ...baseConfig,
  transport: {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
  },
};

// Production-specific configuration optimized for log aggregation
const productionConfig: pino.LoggerOptions = {
  ...baseConfig,
  base: {
    env: environment,
    version: process.env.npm_package_version,
    nodeVersion: process.version,
  },
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
};

const config =
  environment === Environment.Development ? developmentConfig : productionConfig;

export const logger = pino(config);
