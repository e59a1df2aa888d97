#!/usr/bin/env node

/**
 * Calculator HTTP Server
 */

import { ConsoleLogger } from "@dealcalc/shared-utils";
import { Pool } from "pg";
import { MemoryConfigurationRepo } from "../adapters/repo.memory";
import { SqlConfigurationRepo } from "../adapters/repo.sql";
import { JsPdfReportRenderer } from "../adapters/report.pdf";
import { FileSampleSource } from "../adapters/samples.file";
import { loadAppConfig, loadDbConfig, SERVICE_NAME } from "../config/env";
import type { ConfigurationRepoPort } from "../core/ports";
import { SessionStore } from "../core/session";
import { createApp } from "../http/app";

async function main(): Promise<void> {
  const cfg = loadAppConfig();
  const logger = new ConsoleLogger(SERVICE_NAME, cfg.service.logLevel);

  logger.info("Starting calculator API server...");

  let pool: Pool | null = null;
  let configurations: ConfigurationRepoPort;

  if (cfg.storage === "postgres") {
    const db = loadDbConfig(cfg.service.mode);
    pool = new Pool({
      host: db.host,
      port: db.port,
      user: db.user,
      password: db.password,
      database: db.name,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    // Test database connection
    const client = await pool.connect();
    client.release();
    logger.info(`Database connected (${db.host}:${db.port}/${db.name})`);
    configurations = new SqlConfigurationRepo(pool);
  } else {
    logger.info("Using in-memory configuration storage");
    configurations = new MemoryConfigurationRepo();
  }

  const app = createApp(
    {
      configurations,
      samples: new FileSampleSource(cfg.samplesPath),
      renderer: new JsPdfReportRenderer(),
      sessions: new SessionStore(undefined, undefined, cfg.sessions),
      logger: logger.child("http"),
    },
    { corsOrigins: cfg.corsOrigins, jsonLimit: cfg.jsonLimit }
  );

  const server = app.listen(cfg.service.port, () => {
    logger.info(`Calculator API listening on port ${cfg.service.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    server.close(() => {
      const closing = pool ? pool.end() : Promise.resolve();
      closing
        .then(() => {
          logger.info("Server shut down successfully");
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error("Error while closing database pool:", error);
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Calculator API failed to start:", error);
    process.exit(1);
  });
}
