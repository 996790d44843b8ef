import type { Item } from "@items-service/types";
import { z } from "zod";
import type { Session } from "./db";

export const NAME_MAX_LENGTH = 255;
export const DESCRIPTION_MAX_LENGTH = 1000;

// ─── Schema ───────────────────────────────────────────────
// Every statement is create-if-absent; running it against an existing
// database never drops or rewrites anything.
export const ITEMS_SCHEMA = `
CREATE TABLE IF NOT EXISTS items (
  id          SERIAL PRIMARY KEY,
  name        VARCHAR(${NAME_MAX_LENGTH}) NOT NULL,
  description VARCHAR(${DESCRIPTION_MAX_LENGTH}),
  created_at  TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at  TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE INDEX IF NOT EXISTS idx_items_name ON items (name);
CREATE INDEX IF NOT EXISTS idx_items_created_at ON items (created_at DESC);

CREATE OR REPLACE FUNCTION items_touch_updated_at() RETURNS trigger AS $$
BEGIN
  NEW.updated_at := now();
  RETURN NEW;
END;
$$ LANGUAGE plpgsql;

DO $$
BEGIN
  IF NOT EXISTS (SELECT 1 FROM pg_trigger WHERE tgname = 'items_touch_updated_at') THEN
    CREATE TRIGGER items_touch_updated_at
      BEFORE UPDATE ON items
      FOR EACH ROW EXECUTE FUNCTION items_touch_updated_at();
  END IF;
END;
$$;
`;

// ─── Rows ─────────────────────────────────────────────────
const itemRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
});

export type ItemRow = z.infer<typeof itemRowSchema>;

export type NewItem = {
  name: string;
  description: string | null;
};

const COLUMNS = "id, name, description, created_at, updated_at";

export const toItemRow = (row: unknown): ItemRow => itemRowSchema.parse(row);

export const toItem = (row: ItemRow): Item => ({
  id: row.id,
  name: row.name,
  description: row.description,
  created_at: row.created_at.toISOString(),
});

// ─── Queries ──────────────────────────────────────────────
export const ensureSchema = async (session: Session): Promise<void> => {
  await session.query(ITEMS_SCHEMA);
};

export const insertItem = async (session: Session, input: NewItem): Promise<ItemRow> => {
  const { rows } = await session.query(
    `INSERT INTO items (name, description)
     VALUES ($1, $2)
     RETURNING ${COLUMNS}`,
    [input.name, input.description],
  );
  const [row] = rows;
  if (!row) throw new Error("INSERT INTO items returned no row");
  return toItemRow(row);
};

// Ordered by id, which follows insertion order.
export const listItems = async (
  session: Session,
  skip: number,
  limit: number,
): Promise<ItemRow[]> => {
  const { rows } = await session.query(
    `SELECT ${COLUMNS} FROM items
     ORDER BY id ASC
     LIMIT $1 OFFSET $2`,
    [limit, skip],
  );
  return rows.map(toItemRow);
};

export const findItemById = async (
  session: Session,
  id: number,
): Promise<ItemRow | undefined> => {
  const { rows } = await session.query(`SELECT ${COLUMNS} FROM items WHERE id = $1`, [id]);
  const [row] = rows;
  return row ? toItemRow(row) : undefined;
};

/** Resolves to false when no row had that id. */
export const deleteItemById = async (session: Session, id: number): Promise<boolean> => {
  const { rowCount } = await session.query("DELETE FROM items WHERE id = $1", [id]);
  return (rowCount ?? 0) > 0;
};

export const countItems = async (session: Session): Promise<number> => {
  const { rows } = await session.query("SELECT COUNT(*) AS total FROM items");
  // COUNT(*) is a bigint, which pg hands back as a string
  return z.object({ total: z.coerce.number() }).parse(rows[0]).total;
};

// ─── Sample Data ──────────────────────────────────────────
export const SAMPLE_ITEMS: readonly NewItem[] = [
  { name: "Sample Item 1", description: "A demo item inserted when the table was first created" },
  { name: "Sample Item 2", description: "Another example item showing the service in action" },
  { name: "Starter Kit", description: "Seeded so list and get have something to return" },
];

/** Inserts SAMPLE_ITEMS into an empty table; returns how many rows were added. */
export const seedSampleItems = async (session: Session): Promise<number> => {
  if ((await countItems(session)) > 0) return 0;
  for (const item of SAMPLE_ITEMS) {
    await insertItem(session, item);
  }
  return SAMPLE_ITEMS.length;
};
