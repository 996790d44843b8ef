import { Pool } from "pg";
import type { Logger } from "pino";
import type { Settings } from "./config";
import { PersistenceError, PoolExhaustedError, toError } from "./errors";

export const LIVENESS_CHECK = "SELECT 1";

const CHECK_ATTEMPTS = 3;

export type Row = Record<string, unknown>;

// Rows stay untyped here; each query decodes them at the repository edge.
export interface QueryResult {
  rows: Row[];
  rowCount: number | null;
}

export interface PooledConnection {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
  /** Passing an error (or `true`) destroys the connection instead of returning it. */
  release(destroy?: Error | boolean): void;
}

export interface ConnectionPool {
  readonly max: number;
  readonly totalCount: number;
  readonly idleCount: number;
  readonly waitingCount: number;
  connect(): Promise<PooledConnection>;
  end(): Promise<void>;
}

/** The query surface handed to work running inside `withSession`. */
export interface Session {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
}

// ─── DB Pool ──────────────────────────────────────────────
// pg grows lazily up to `max` and closes connections idle for longer
// than idleTimeoutMillis, so the overflow beyond the baseline shrinks
// back on its own once load drops.
export const createPgPool = (settings: Settings, logger: Logger): ConnectionPool => {
  const max = settings.pool.size + settings.pool.maxOverflow;
  const pool = new Pool({
    connectionString: settings.databaseUrl,
    max,
    idleTimeoutMillis: settings.pool.idleTimeoutMs,
    connectionTimeoutMillis: settings.pool.timeoutMs,
  });

  pool.on("error", (err) => logger.error({ err }, "Idle pool client error"));

  return {
    max,
    get totalCount() {
      return pool.totalCount;
    },
    get idleCount() {
      return pool.idleCount;
    },
    get waitingCount() {
      return pool.waitingCount;
    },
    async connect() {
      const client = await pool.connect();
      return {
        async query(text: string, values?: unknown[]): Promise<QueryResult> {
          const { rows, rowCount } = await client.query(text, values);
          return { rows, rowCount };
        },
        release: (destroy?: Error | boolean) => client.release(destroy),
      };
    },
    end: () => pool.end(),
  };
};

const isPoolTimeout = (err: unknown): boolean =>
  err instanceof Error && /timeout exceeded when trying to connect/i.test(err.message);

// ─── Sessions ─────────────────────────────────────────────
// One session per unit of work: BEGIN, the caller's work, COMMIT.
// Anything thrown rolls back. The connection goes back to the pool
// on every exit path.
export class SessionFactory {
  constructor(
    private readonly pool: ConnectionPool,
    private readonly logger: Logger,
  ) {}

  /** Connections that can be handed out right now without waiting. */
  get available(): number {
    return this.pool.max - this.pool.totalCount + this.pool.idleCount;
  }

  async withSession<T>(work: (session: Session) => Promise<T>): Promise<T> {
    const conn = await this.acquire();
    let open = true;
    let broken: Error | undefined;

    const session: Session = {
      query: (text, values) => {
        if (!open) {
          return Promise.reject(new Error("Session is closed"));
        }
        return conn.query(text, values);
      },
    };

    try {
      await conn.query("BEGIN");
      const result = await work(session);
      await conn.query("COMMIT");
      return result;
    } catch (err) {
      broken = await this.rollback(conn);
      throw err;
    } finally {
      open = false;
      conn.release(broken);
    }
  }

  async ping(): Promise<void> {
    await this.withSession(async (session) => {
      await session.query(LIVENESS_CHECK);
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async acquire(): Promise<PooledConnection> {
    for (let attempt = 1; ; attempt++) {
      const conn = await this.checkout();
      try {
        await conn.query(LIVENESS_CHECK);
        return conn;
      } catch (err) {
        conn.release(toError(err));
        this.logger.warn({ err, attempt }, "Discarded connection that failed its liveness check");
        if (attempt >= CHECK_ATTEMPTS) {
          throw new PersistenceError("No live database connection available", { cause: err });
        }
      }
    }
  }

  private async checkout(): Promise<PooledConnection> {
    try {
      return await this.pool.connect();
    } catch (err) {
      if (isPoolTimeout(err)) {
        throw new PoolExhaustedError("Timed out waiting for a pooled connection", { cause: err });
      }
      throw new PersistenceError("Database unavailable", { cause: err });
    }
  }

  // Returns the error to destroy the connection with when ROLLBACK itself fails.
  private async rollback(conn: PooledConnection): Promise<Error | undefined> {
    try {
      await conn.query("ROLLBACK");
      return undefined;
    } catch (err) {
      this.logger.error({ err }, "Rollback failed; discarding connection");
      return toError(err);
    }
  }
}
