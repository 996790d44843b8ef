import type { ErrorBody } from "@items-service/types";
import compression from "compression";
import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import rateLimit from "express-rate-limit";
import helmet from "helmet";
import type { Logger } from "pino";
import type { Settings } from "./config";
import type { SessionFactory } from "./db";
import {
  NotFoundError,
  PersistenceError,
  PoolExhaustedError,
  ValidationError,
} from "./errors";
import type { Metrics } from "./metrics";
import { createRouter } from "./routes";

export interface AppDeps {
  settings: Settings;
  logger: Logger;
  sessions: SessionFactory;
  metrics: Metrics;
}

// Errors raised by body-parser and friends (http-errors) carry a
// client-facing status and `expose: true`.
const isClientHttpError = (err: unknown): err is { status: number; message: string } =>
  typeof err === "object" &&
  err !== null &&
  "status" in err &&
  typeof err.status === "number" &&
  err.status >= 400 &&
  err.status < 500 &&
  "expose" in err &&
  err.expose === true &&
  "message" in err &&
  typeof err.message === "string";

export const createApp = (deps: AppDeps): Express => {
  const { settings, logger, metrics } = deps;
  const app = express();

  app.disable("x-powered-by");
  app.use(helmet());
  // Reflects any origin with credentials. Acceptable for a template,
  // not for production: replace with an explicit allow-list.
  app.use(cors({ origin: true, credentials: true }));
  app.use(compression());
  app.use(express.json({ limit: "100kb" }));

  if (settings.rateLimitPerMinute > 0) {
    app.use(
      rateLimit({
        windowMs: 60_000,
        limit: settings.rateLimitPerMinute,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  // Request logger middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      logger.info({
        method: req.method,
        path: req.path,
        status: res.statusCode,
        ms: Date.now() - start,
      });
    });
    next();
  });

  app.use(metrics.middleware);
  app.use(createRouter(deps));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ detail: "Not Found" } satisfies ErrorBody);
  });

  // Error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      res.status(err.status).json({ detail: err.message, errors: err.issues } satisfies ErrorBody);
      return;
    }
    if (err instanceof NotFoundError) {
      logger.debug({ path: req.path }, err.message);
      res.status(err.status).json({ detail: err.message } satisfies ErrorBody);
      return;
    }
    if (err instanceof PoolExhaustedError) {
      logger.error({ err, path: req.path }, err.message);
      res.status(err.status).json({ detail: "Service temporarily unavailable" } satisfies ErrorBody);
      return;
    }
    if (err instanceof PersistenceError) {
      logger.error({ err, path: req.path }, err.message);
      res.status(err.status).json({ detail: err.message } satisfies ErrorBody);
      return;
    }
    if (isClientHttpError(err)) {
      res.status(err.status).json({ detail: err.message } satisfies ErrorBody);
      return;
    }

    logger.error({ err }, "Unhandled error");
    res.status(500).json({ detail: "Internal server error" } satisfies ErrorBody);
  });

  return app;
};
