// Re-export all shared utilities
export {
  createDatabaseConfig,
  createServiceConfig,
  parseEnvArray,
  parseEnvNumber,
  validateRequiredEnv,
} from "./config";
export type { DatabaseConfig, Env, ServiceConfig } from "./config";

export { ConsoleLogger, parseLogLevel, silentLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";

// Version info
export const VERSION = "1.0.0";
