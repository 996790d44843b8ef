import pino, { type Logger } from "pino";
import type { Settings } from "./config";

// ─── Logger ───────────────────────────────────────────────
// Pretty output on a developer machine, raw JSON everywhere else
// so log aggregators can parse it.
export const createLogger = (
  settings: Pick<Settings, "environment" | "logLevel">,
): Logger =>
  pino({
    level: settings.logLevel,
    transport:
      settings.environment === "development"
        ? { target: require.resolve("pino-pretty") }
        : undefined,
  });
