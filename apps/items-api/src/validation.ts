import type { ItemCreate } from "@items-service/types";
import { z } from "zod";
import { ValidationError } from "./errors";
import { DESCRIPTION_MAX_LENGTH, NAME_MAX_LENGTH, type NewItem } from "./items";

const INT4_MIN = -2_147_483_648;
const INT4_MAX = 2_147_483_647;

export const DEFAULT_LIST_LIMIT = 100;

// VARCHAR(n) counts characters, so lengths are measured in code points.
const charLength = (value: string) => [...value].length;

export const itemCreateSchema = z.object({
  name: z
    .string()
    .refine((name) => charLength(name) <= NAME_MAX_LENGTH, `name must be at most ${NAME_MAX_LENGTH} characters`)
    .refine((name) => name.trim().length > 0, "name must not be blank"),
  description: z
    .string()
    .refine(
      (description) => charLength(description) <= DESCRIPTION_MAX_LENGTH,
      `description must be at most ${DESCRIPTION_MAX_LENGTH} characters`,
    )
    .nullish(),
});

// Plain decimal digits only; Number() alone would also take "0x10", "1e1" or " 16".
const UNSIGNED_INT = /^\d+$/;
const SIGNED_INT = /^-?\d+$/;

const queryInt = (fallback: number) =>
  z
    .string()
    .regex(UNSIGNED_INT, "Expected a non-negative integer")
    .optional()
    .transform((value) => (value === undefined ? fallback : Number(value)))
    .pipe(z.number().int().max(Number.MAX_SAFE_INTEGER));

export const listQuerySchema = z.object({
  skip: queryInt(0),
  limit: queryInt(DEFAULT_LIST_LIMIT),
});

export const itemIdSchema = z.object({
  id: z
    .string()
    .regex(SIGNED_INT, "Expected an integer")
    .transform(Number)
    .pipe(z.number().int().min(INT4_MIN).max(INT4_MAX)),
});

export type ListQuery = z.infer<typeof listQuerySchema>;

const parse = <S extends z.ZodTypeAny>(schema: S, input: unknown, message: string): z.infer<S> => {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      message,
      result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    );
  }
  return result.data;
};

export const parseItemCreate = (body: unknown): NewItem => {
  const payload: ItemCreate = parse(itemCreateSchema, body, "Invalid item payload");
  return { name: payload.name, description: payload.description ?? null };
};

export const parseListQuery = (query: unknown): ListQuery =>
  parse(listQuerySchema, query, "Invalid pagination parameters");

export const parseItemId = (params: unknown): number =>
  parse(itemIdSchema, params, "Invalid item id").id;
