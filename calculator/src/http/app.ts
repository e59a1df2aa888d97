import cors from "cors";
import express from "express";
import type { Express } from "express";
import helmet from "helmet";
import { CalculatorMiddleware } from "./middleware";
import { CalculatorRoutes } from "./routes";
import type { RouteDependencies } from "./routes";

export interface AppOptions {
  corsOrigins: string[];
  jsonLimit: string;
}

const DEFAULT_OPTIONS: AppOptions = {
  corsOrigins: ["*"],
  jsonLimit: "100kb",
};

/**
 * Build the express app. Every stateful collaborator comes in through deps.
 */
export function createApp(
  deps: RouteDependencies,
  options: Partial<AppOptions> = {}
): Express {
  const { corsOrigins, jsonLimit } = { ...DEFAULT_OPTIONS, ...options };
  const middleware = new CalculatorMiddleware(deps.logger);
  const routes = new CalculatorRoutes(deps, middleware);

  const app = express();
  app.disable("x-powered-by");
  app.use(helmet());
  app.use(cors({ origin: corsOrigins.includes("*") ? "*" : corsOrigins }));
  app.use(express.json({ limit: jsonLimit }));
  app.use(middleware.requestLogger());

  app.use(routes.getRouter());

  app.use(middleware.notFound());
  app.use(middleware.errorHandler());

  return app;
}
