/**
 * Environment configuration for the calculator service
 */

import * as dotenv from "dotenv";
import {
  createDatabaseConfig,
  createServiceConfig,
  parseEnvArray,
  parseEnvNumber,
  validateRequiredEnv,
} from "@dealcalc/shared-utils";
import type {
  DatabaseConfig,
  Env,
  ServiceConfig,
} from "@dealcalc/shared-utils";
import { DEFAULT_SAMPLES_PATH } from "../adapters/samples.file";
import type { SessionStoreOptions } from "../core/session";

dotenv.config();

export const SERVICE_NAME = "calculator";

export interface AppConfig {
  service: ServiceConfig;
  storage: "memory" | "postgres";
  samplesPath: string;
  corsOrigins: string[];
  jsonLimit: string;
  sessions: SessionStoreOptions;
}

// Production never falls back to the development database defaults
const REQUIRED_PRODUCTION_DB_VARS = ["DB_HOST", "DB_USER", "DB_PASSWORD", "DB_NAME"];

export function loadAppConfig(env: Env = process.env): AppConfig {
  return {
    service: createServiceConfig(3004, env),
    storage: env.STORAGE === "postgres" ? "postgres" : "memory",
    samplesPath: env.SAMPLES_PATH || DEFAULT_SAMPLES_PATH,
    corsOrigins: parseEnvArray("CORS_ORIGINS", ["*"], env),
    jsonLimit: env.JSON_LIMIT || "100kb",
    sessions: {
      maxSessions: parseEnvNumber("MAX_SESSIONS", 1000, env),
      idleTtlMs: parseEnvNumber("SESSION_TTL_MINUTES", 30, env) * 60 * 1000,
      maxEventsPerSession: parseEnvNumber("MAX_SESSION_EVENTS", 500, env),
    },
  };
}

export function loadDbConfig(
  mode: ServiceConfig["mode"],
  env: Env = process.env
): DatabaseConfig {
  if (mode === "production") {
    validateRequiredEnv(REQUIRED_PRODUCTION_DB_VARS, env);
  }
  return createDatabaseConfig(SERVICE_NAME, env);
}
