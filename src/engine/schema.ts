import { z } from "zod";
import { InvalidInputError } from "./errors";

export const MAX_NEIGHBOUR_MINES = 8;

export const boardSizeSchema = z.object({
  rows: z.number().int().positive("rows must be a positive integer"),
  cols: z.number().int().positive("cols must be a positive integer"),
});

export const gameConfigSchema = boardSizeSchema
  .extend({
    minesTotal: z.number().int().nonnegative("minesTotal must be a non-negative integer"),
    seed: z.number().int(),
    safeFirstClick: z.boolean(),
  })
  .refine((c) => c.minesTotal <= c.rows * c.cols, {
    message: "minesTotal exceeds the number of cells",
    path: ["minesTotal"],
  });

export const posSchema = z.object({
  row: z.number().int(),
  col: z.number().int(),
});

export const mineCountSchema = z
  .number()
  .int("count must be an integer")
  .min(0, "count must not be negative")
  .max(MAX_NEIGHBOUR_MINES, `count must be at most ${MAX_NEIGHBOUR_MINES}`);

export const constraintCountSchema = z.number().int("count must be an integer").nonnegative("count must not be negative");

// what a `() => number` rng may return: [0, 1), no NaN
export const rngValueSchema = z
  .number()
  .min(0, "rng must return a value in [0, 1)")
  .lt(1, "rng must return a value in [0, 1)");

/** Parse `value` or throw an InvalidInputError carrying the first issue. */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` (${issue.path.join(".")})` : "";
    throw new InvalidInputError(`Invalid ${what}${where}: ${issue.message}`);
  }
  return result.data;
}
