/**
 * JSON filter documents
 *
 * { "age": 30 }                          age = 30
 * { "age": { "$gte": 18, "$lt": 65 } }   age >= 18 AND age < 65
 * { "$or": [{ "name": "Ann" }, ...] }    left-folded OR
 *
 * Several fields or operators in one object are ANDed in document order.
 */

import { z } from "zod";
import { InvalidQueryError } from "./errors.js";
import { and, or, predicate, type PakQuery } from "./query.js";
import type { QueryOperator } from "./types.js";

const valueSchema = z.union([z.string(), z.number().finite(), z.boolean()]);

const OPERATORS = [
  ["$eq", "eq"],
  ["$lt", "lt"],
  ["$lte", "lte"],
  ["$gt", "gt"],
  ["$gte", "gte"],
] as const satisfies ReadonlyArray<readonly [string, QueryOperator]>;

const operatorSchema = z
  .object({
    $eq: valueSchema.optional(),
    $lt: valueSchema.optional(),
    $lte: valueSchema.optional(),
    $gt: valueSchema.optional(),
    $gte: valueSchema.optional(),
  })
  .strict()
  .refine((ops) => Object.values(ops).some((v) => v !== undefined), {
    message: "operator object must not be empty",
  });

const documentSchema = z
  .record(z.unknown())
  .refine((doc) => Object.keys(doc).length > 0, { message: "filter must not be empty" });

const clausesSchema = z.array(z.unknown()).min(1, { message: "must list at least one filter" });

/**
 * Parse a filter document into a query tree
 * @throws InvalidQueryError if the document is malformed
 */
export function parseFilter(input: unknown): PakQuery {
  return parseDocument(input, "$");
}

/**
 * Parse filter JSON text
 * @throws InvalidQueryError if the text is not JSON or the document is malformed
 */
export function parseFilterJSON(text: string): PakQuery {
  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (err) {
    throw new InvalidQueryError(`filter is not valid JSON`, { cause: err });
  }
  return parseFilter(input);
}

function parseDocument(input: unknown, path: string): PakQuery {
  const doc = check(documentSchema, input, path);
  const parts: PakQuery[] = [];

  for (const [key, raw] of Object.entries(doc)) {
    const at = `${path}.${key}`;
    if (key === "$and" || key === "$or") {
      const clauses = check(clausesSchema, raw, at).map((clause, i) =>
        parseDocument(clause, `${at}[${i}]`)
      );
      parts.push(fold(clauses, key === "$and" ? and : or));
    } else if (key.startsWith("$")) {
      throw new InvalidQueryError(`${at}: unknown operator "${key}"`);
    } else {
      parts.push(...parseField(key, raw, at));
    }
  }

  return fold(parts, and);
}

function parseField(key: string, raw: unknown, path: string): PakQuery[] {
  const direct = valueSchema.safeParse(raw);
  if (direct.success) {
    return [predicate(key, "eq", direct.data)];
  }

  const ops = check(operatorSchema, raw, path);
  const out: PakQuery[] = [];
  for (const [name, operator] of OPERATORS) {
    const value = ops[name];
    if (value !== undefined) {
      out.push(predicate(key, operator, value));
    }
  }
  return out;
}

function fold(parts: readonly PakQuery[], join: (left: PakQuery, right: PakQuery) => PakQuery): PakQuery {
  const [first, ...rest] = parts;
  if (first === undefined) {
    throw new InvalidQueryError("filter must not be empty");
  }
  return rest.reduce((left, right) => join(left, right), first);
}

function check<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, path: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${path}.${issue.path.join(".")}` : path;
    throw new InvalidQueryError(`${where}: ${issue ? issue.message : "invalid filter"}`, {
      cause: result.error,
    });
  }
  return result.data;
}
