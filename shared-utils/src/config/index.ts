/**
 * Shared configuration utilities for the calculator workspaces
 */

import { parseLogLevel } from "../logger";
import type { LogLevel } from "../logger";

export type Env = Record<string, string | undefined>;

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
}

export interface ServiceConfig {
  mode: "development" | "production" | "test";
  logLevel: LogLevel;
  port: number;
}

/**
 * Create database configuration from environment variables
 */
export function createDatabaseConfig(
  serviceName: string,
  env: Env = process.env
): DatabaseConfig {
  return {
    host: env.DB_HOST ?? "localhost",
    port: parseEnvNumber("DB_PORT", 5432, env),
    user: env.DB_USER ?? serviceName,
    password: env.DB_PASSWORD ?? serviceName,
    name: env.DB_NAME ?? `${serviceName}_dev`,
  };
}

/**
 * Create service configuration from environment variables
 */
export function createServiceConfig(
  defaultPort: number,
  env: Env = process.env
): ServiceConfig {
  return {
    mode: parseMode(env.MODE ?? env.NODE_ENV),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    port: parseEnvNumber("PORT", defaultPort, env),
  };
}

function parseMode(value: string | undefined): ServiceConfig["mode"] {
  if (value === "production" || value === "test") return value;
  return "development";
}

/**
 * Validate required environment variables
 */
export function validateRequiredEnv(
  requiredVars: string[],
  env: Env = process.env
): void {
  const missing = requiredVars.filter((varName) => !env[varName]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(", ")}`
    );
  }
}

/**
 * Parse a numeric environment variable, falling back when unset
 */
export function parseEnvNumber(
  envVar: string,
  defaultValue: number,
  env: Env = process.env
): number {
  const value = env[envVar];
  if (value === undefined || value === "") return defaultValue;

  const num = Number(value);
  if (isNaN(num)) {
    throw new Error(`Invalid number in ${envVar}: ${value}`);
  }
  return num;
}

/**
 * Parse comma-separated environment variable into array
 */
export function parseEnvArray(
  envVar: string,
  defaultValue: string[] = [],
  env: Env = process.env
): string[] {
  const value = env[envVar];
  if (!value) return defaultValue;

  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}
