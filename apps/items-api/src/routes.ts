import type {
  DeleteConfirmation,
  HealthReport,
  Item,
  ServiceBanner,
} from "@items-service/types";
import { Router, type NextFunction, type Request, type Response } from "express";
import type { Logger } from "pino";
import type { Settings } from "./config";
import type { SessionFactory } from "./db";
import { asPersistenceError, NotFoundError } from "./errors";
import type { Metrics } from "./metrics";
import { deleteItemById, findItemById, insertItem, listItems, toItem } from "./items";
import { parseItemCreate, parseItemId, parseListQuery } from "./validation";

export const SERVICE_VERSION = "1.0.0";

// Pages above this size are served but flagged; the list endpoint
// deliberately has no upper bound on `limit`.
export const LARGE_PAGE_WARN_THRESHOLD = 1_000;

export interface RouterDeps {
  settings: Settings;
  logger: Logger;
  sessions: SessionFactory;
  metrics: Metrics;
}

export const createRouter = ({ settings, logger, sessions, metrics }: RouterDeps): Router => {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    res.json({
      message: "Items Service API",
      version: SERVICE_VERSION,
      health: "/health",
      metrics: "/metrics",
    } satisfies ServiceBanner);
  });

  // HEALTH: degrades in-band, never fails the request
  router.get("/health", async (_req: Request, res: Response) => {
    let database: HealthReport["database"] = "connected";
    try {
      await sessions.ping();
    } catch (err) {
      logger.error({ err }, "Database health check failed");
      database = "disconnected";
    }

    res.json({
      status: database === "connected" ? "healthy" : "degraded",
      database,
      environment: settings.environment,
      timestamp: new Date().toISOString(),
    } satisfies HealthReport);
  });

  router.get("/metrics", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const body = await metrics.registry.metrics();
      res.set("Content-Type", metrics.registry.contentType).send(body);
    } catch (err) {
      next(err);
    }
  });

  // CREATE item
  router.post("/items", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = parseItemCreate(req.body);

      const row = await sessions
        .withSession((session) => insertItem(session, input))
        .catch((err: unknown) => {
          throw asPersistenceError(err, "Failed to create item");
        });

      logger.info({ itemId: row.id }, "Created item");
      res.status(201).json(toItem(row) satisfies Item);
    } catch (err) {
      next(err);
    }
  });

  // LIST items, offset pagination in insertion order
  router.get("/items", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { skip, limit } = parseListQuery(req.query);
      if (limit > LARGE_PAGE_WARN_THRESHOLD) {
        logger.warn({ skip, limit }, "Large page requested from /items; response size is unbounded");
      }

      const rows = await sessions
        .withSession((session) => listItems(session, skip, limit))
        .catch((err: unknown) => {
          throw asPersistenceError(err, "Failed to fetch items");
        });

      res.json(rows.map(toItem) satisfies Item[]);
    } catch (err) {
      next(err);
    }
  });

  // GET single item
  router.get("/items/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseItemId(req.params);

      const row = await sessions
        .withSession((session) => findItemById(session, id))
        .catch((err: unknown) => {
          throw asPersistenceError(err, "Failed to fetch item");
        });

      if (!row) throw new NotFoundError("Item not found");
      res.json(toItem(row) satisfies Item);
    } catch (err) {
      next(err);
    }
  });

  // DELETE item (hard delete)
  router.delete("/items/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseItemId(req.params);

      const deleted = await sessions
        .withSession((session) => deleteItemById(session, id))
        .catch((err: unknown) => {
          throw asPersistenceError(err, "Failed to delete item");
        });

      if (!deleted) throw new NotFoundError("Item not found");

      logger.info({ itemId: id }, "Deleted item");
      res.json({ message: "Item deleted successfully" } satisfies DeleteConfirmation);
    } catch (err) {
      next(err);
    }
  });

  return router;
};
