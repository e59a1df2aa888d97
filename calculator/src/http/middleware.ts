/**
 * Express middleware for the calculator API
 *
 * Validation, request logging and error mapping.
 */

import type { Logger } from "@dealcalc/shared-utils";
import type {
  ErrorRequestHandler,
  NextFunction,
  Request,
  RequestHandler,
  Response,
} from "express";
import { z } from "zod";
import type { APIResponse } from "../core/dto";

type BodyHandler<T> = (body: T, req: Request, res: Response) => Promise<void>;
type Handler = (req: Request, res: Response) => Promise<void>;

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = "HttpError";
  }
}

function hasStatus(error: unknown): error is { status: number; type?: string } {
  return (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  );
}

export class CalculatorMiddleware {
  constructor(private logger: Logger) {}

  // ===== Handler wrappers =====

  handle(handler: Handler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      handler(req, res).catch(next);
    };
  }

  /**
   * Parse the JSON body with a schema before calling the handler
   */
  withBody<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    handler: BodyHandler<T>
  ): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) {
        sendError(res, 400, "Validation error", {
          errors: parsed.error.errors.map((e) => ({
            path: e.path.join("."),
            message: e.message,
          })),
        });
        return;
      }
      handler(parsed.data, req, res).catch(next);
    };
  }

  // ===== Logging Middleware =====

  requestLogger(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();

      res.on("finish", () => {
        const logData = {
          method: req.method,
          url: req.originalUrl,
          statusCode: res.statusCode,
          duration: Date.now() - startTime,
        };

        if (res.statusCode >= 400) {
          this.logger.warn("HTTP request failed", logData);
        } else {
          this.logger.info("HTTP request completed", logData);
        }
      });

      next();
    };
  }

  // ===== Error Handling =====

  notFound(): RequestHandler {
    return (req: Request, res: Response) => {
      sendError(res, 404, `Route not found: ${req.method} ${req.path}`);
    };
  }

  errorHandler(): ErrorRequestHandler {
    return (error: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof HttpError) {
        sendError(res, error.status, error.message, error.details);
        return;
      }

      // body-parser failures carry their own status
      if (hasStatus(error) && error.status >= 400 && error.status < 500) {
        const message =
          error.type === "entity.parse.failed"
            ? "Invalid JSON body"
            : "Invalid request body";
        sendError(res, error.status, message);
        return;
      }

      this.logger.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, error);
      sendError(res, 500, "Internal server error");
    };
  }
}

// ===== Response helpers =====

export function sendData<T>(res: Response, data: T, status = 200): void {
  const response: APIResponse<T> = {
    success: true,
    data,
    timestamp: new Date().toISOString(),
  };
  res.status(status).json(response);
}

export function sendError(
  res: Response,
  status: number,
  message: string,
  details?: unknown
): void {
  const response: APIResponse<never> = {
    success: false,
    error: message,
    timestamp: new Date().toISOString(),
    ...(details !== undefined ? { details } : {}),
  };
  res.status(status).json(response);
}
