import type { ConnectionPool, PooledConnection, QueryResult, Row } from "../../src/db";

type StoredItem = {
  id: number;
  name: string;
  description: string | null;
  created_at: Date;
  updated_at: Date;
};

export interface FakePoolOptions {
  max?: number;
  connectionTimeoutMillis?: number;
  now?: () => Date;
}

type Waiter = (conn: FakeConnection) => void;

const normalize = (sql: string) => sql.replace(/\s+/g, " ").trim();

const result = (rows: Row[], rowCount: number | null = rows.length): QueryResult => ({
  rows,
  rowCount,
});

/**
 * In-process stand-in for a pg pool backed by a single `items` table.
 * Understands exactly the statements the service issues and mimics pg's
 * checkout, wait-timeout and destroy-on-release behavior.
 */
export class FakePool implements ConnectionPool {
  readonly max: number;
  totalCount = 0;
  items: StoredItem[] = [];
  statements: string[] = [];
  schemaApplied = false;
  destroyed = 0;
  ended = false;

  /** Statements matching this pattern throw. */
  failOn: RegExp | undefined;
  /** connect() rejects while set. */
  unreachable = false;
  /** Number of upcoming liveness checks that fail, as a dropped connection would. */
  staleChecks = 0;
  failRollback = false;

  private nextId = 1;
  private idle: FakeConnection[] = [];
  private waiters: Waiter[] = [];
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(options: FakePoolOptions = {}) {
    this.max = options.max ?? 5;
    this.timeoutMs = options.connectionTimeoutMillis ?? 50;
    this.now = options.now ?? (() => new Date());
  }

  get idleCount(): number {
    return this.idle.length;
  }

  get waitingCount(): number {
    return this.waiters.length;
  }

  connect(): Promise<PooledConnection> {
    if (this.unreachable) {
      return Promise.reject(new Error("connect ECONNREFUSED 127.0.0.1:5432"));
    }
    const idle = this.idle.pop();
    if (idle) return Promise.resolve(idle.checkout());
    if (this.totalCount < this.max) {
      this.totalCount++;
      return Promise.resolve(new FakeConnection(this));
    }

    return new Promise<PooledConnection>((resolve, reject) => {
      const waiter: Waiter = (conn) => {
        clearTimeout(timer);
        resolve(conn.checkout());
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(new Error("timeout exceeded when trying to connect"));
      }, this.timeoutMs);
      this.waiters.push(waiter);
    });
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  checkin(conn: FakeConnection, destroy: boolean): void {
    if (destroy) {
      this.totalCount--;
      this.destroyed++;
      const waiter = this.waiters.shift();
      if (waiter) {
        this.totalCount++;
        waiter(new FakeConnection(this));
      }
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) waiter(conn);
    else this.idle.push(conn);
  }

  execute(conn: FakeConnection, text: string, values: unknown[]): QueryResult {
    const sql = normalize(text);
    this.statements.push(sql);

    if (this.failOn?.test(sql)) {
      throw new Error(`simulated failure running: ${sql}`);
    }

    if (sql === "SELECT 1") {
      if (this.staleChecks > 0) {
        this.staleChecks--;
        throw new Error("Connection terminated unexpectedly");
      }
      return result([{ "?column?": 1 }]);
    }
    if (sql === "BEGIN") {
      conn.snapshot = this.items.map((item) => ({ ...item }));
      return result([], null);
    }
    if (sql === "COMMIT") {
      conn.snapshot = undefined;
      return result([], null);
    }
    if (sql === "ROLLBACK") {
      if (this.failRollback) throw new Error("Connection terminated unexpectedly");
      if (conn.snapshot) this.items = conn.snapshot;
      conn.snapshot = undefined;
      return result([], null);
    }
    if (sql.startsWith("CREATE TABLE IF NOT EXISTS items")) {
      this.schemaApplied = true;
      return result([], null);
    }
    if (sql.startsWith("INSERT INTO items (name, description) VALUES ($1, $2) RETURNING")) {
      const [name, description] = values;
      if (typeof name !== "string") throw new Error('null value in column "name" violates not-null constraint');
      const at = this.now();
      const item: StoredItem = {
        id: this.nextId++,
        name,
        description: typeof description === "string" ? description : null,
        created_at: at,
        updated_at: at,
      };
      this.items.push(item);
      return result([{ ...item }]);
    }
    if (/^SELECT .+ FROM items ORDER BY id ASC LIMIT \$1 OFFSET \$2$/.test(sql)) {
      const [limit, skip] = values.map(Number);
      const page = [...this.items].sort((a, b) => a.id - b.id).slice(skip, skip + limit);
      return result(page.map((item) => ({ ...item })));
    }
    if (/^SELECT .+ FROM items WHERE id = \$1$/.test(sql)) {
      const id = Number(values[0]);
      return result(this.items.filter((item) => item.id === id).map((item) => ({ ...item })));
    }
    if (sql === "DELETE FROM items WHERE id = $1") {
      const id = Number(values[0]);
      const before = this.items.length;
      this.items = this.items.filter((item) => item.id !== id);
      return result([], before - this.items.length);
    }
    if (sql === "SELECT COUNT(*) AS total FROM items") {
      return result([{ total: String(this.items.length) }]);
    }

    throw new Error(`FakePool cannot run: ${sql}`);
  }
}

export class FakeConnection implements PooledConnection {
  snapshot: StoredItem[] | undefined;
  private released = false;

  constructor(private readonly pool: FakePool) {}

  checkout(): this {
    this.released = false;
    return this;
  }

  async query(text: string, values: unknown[] = []): Promise<QueryResult> {
    if (this.released) throw new Error("Client was used after being released to the pool");
    return this.pool.execute(this, text, values);
  }

  release(destroy?: Error | boolean): void {
    if (this.released) {
      throw new Error("Release called on client which has already been released to the pool.");
    }
    this.released = true;
    this.pool.checkin(this, destroy !== undefined && destroy !== false);
  }
}
