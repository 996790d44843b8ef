import type { Request, RequestHandler } from "express";
import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from "prom-client";

// ─── Metrics ──────────────────────────────────────────────
// One registry per app instance so that separate apps (and tests)
// never share counters.
export interface Metrics {
  readonly registry: Registry;
  readonly middleware: RequestHandler;
}

export interface MetricsSources {
  /** Free pooled connections, sampled at scrape time. */
  availableConnections(): number;
}

const routeLabel = (req: Request): string => {
  const route: unknown = req.route;
  if (typeof route === "object" && route !== null && "path" in route && typeof route.path === "string") {
    return req.baseUrl + route.path;
  }
  return "unmatched";
};

export const createMetrics = (sources: MetricsSources): Metrics => {
  const registry = new Registry();
  collectDefaultMetrics({ register: registry });

  const requests = new Counter({
    name: "http_requests_total",
    help: "Total HTTP requests",
    labelNames: ["method", "route", "status"] as const,
    registers: [registry],
  });

  const duration = new Histogram({
    name: "http_request_duration_seconds",
    help: "HTTP request latency in seconds",
    labelNames: ["method", "route"] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
    registers: [registry],
  });

  new Gauge({
    name: "db_pool_available_connections",
    help: "Pooled database connections free to hand out",
    registers: [registry],
    collect() {
      this.set(sources.availableConnections());
    },
  });

  const middleware: RequestHandler = (req, res, next) => {
    const stopTimer = duration.startTimer();
    res.on("finish", () => {
      const route = routeLabel(req);
      requests.inc({ method: req.method, route, status: String(res.statusCode) });
      stopTimer({ method: req.method, route });
    });
    next();
  };

  return { registry, middleware };
};
