/**
 * Query trees and their evaluation against indexes
 *
 * A query is an immutable binary tree of predicates joined by AND/OR.
 * Evaluation yields a duplicate-free pointer list sorted by offset; AND and OR
 * are sorted merges over such lists, so both are commutative and associative.
 */

import { InvalidQueryError } from "./errors.js";
import type { PakIndex } from "./indexes.js";
import { comparePointers } from "./pointer.js";
import { validateKeyName } from "./validation.js";
import { encodeValue, formatValue } from "./value.js";
import type { PakValue, Pointer, QueryOperator } from "./types.js";

export interface PredicateNode {
  readonly kind: "predicate";
  readonly key: string;
  readonly operator: QueryOperator;
  readonly value: PakValue;
}

export interface AndNode {
  readonly kind: "and";
  readonly left: PakQuery;
  readonly right: PakQuery;
}

export interface OrNode {
  readonly kind: "or";
  readonly left: PakQuery;
  readonly right: PakQuery;
}

export type PakQuery = PredicateNode | AndNode | OrNode;

/**
 * Anything that can resolve an index by key
 */
export interface IndexSource {
  index(key: string): PakIndex | undefined;
}

const OPERATOR_SYMBOLS: Record<QueryOperator, string> = {
  eq: "=",
  lt: "<",
  lte: "<=",
  gt: ">",
  gte: ">=",
};

/**
 * Build a predicate leaf
 * @throws InvalidQueryError for an invalid key or a value that cannot be indexed
 */
export function predicate(key: string, operator: QueryOperator, value: PakValue): PredicateNode {
  try {
    validateKeyName(key);
  } catch (err) {
    throw new InvalidQueryError(err instanceof Error ? err.message : String(err), { cause: err });
  }
  try {
    encodeValue(value);
  } catch (err) {
    throw new InvalidQueryError(`value for key "${key}" cannot be indexed`, { cause: err });
  }
  const node: PredicateNode = { kind: "predicate", key, operator, value };
  return Object.freeze(node);
}

export function equals(key: string, value: PakValue): PredicateNode {
  return predicate(key, "eq", value);
}

export function lessThan(key: string, value: PakValue): PredicateNode {
  return predicate(key, "lt", value);
}

export function lessThanOrEqual(key: string, value: PakValue): PredicateNode {
  return predicate(key, "lte", value);
}

export function greaterThan(key: string, value: PakValue): PredicateNode {
  return predicate(key, "gt", value);
}

export function greaterThanOrEqual(key: string, value: PakValue): PredicateNode {
  return predicate(key, "gte", value);
}

/**
 * Conjunction; extra operands fold left: and(a, b, c) = (a AND b) AND c
 */
export function and(left: PakQuery, right: PakQuery, ...rest: PakQuery[]): PakQuery {
  return rest.reduce(andNode, andNode(left, right));
}

function andNode(left: PakQuery, right: PakQuery): PakQuery {
  const node: AndNode = { kind: "and", left, right };
  return Object.freeze(node);
}

/**
 * Disjunction; extra operands fold left: or(a, b, c) = (a OR b) OR c
 */
export function or(left: PakQuery, right: PakQuery, ...rest: PakQuery[]): PakQuery {
  return rest.reduce(orNode, orNode(left, right));
}

function orNode(left: PakQuery, right: PakQuery): PakQuery {
  const node: OrNode = { kind: "or", left, right };
  return Object.freeze(node);
}

/**
 * Sort by offset and drop duplicates
 */
export function normalizePointers(pointers: readonly Pointer[]): Pointer[] {
  const sorted = [...pointers].sort(comparePointers);
  const out: Pointer[] = [];
  for (const pointer of sorted) {
    const last = out[out.length - 1];
    if (last === undefined || comparePointers(last, pointer) !== 0) {
      out.push(pointer);
    }
  }
  return out;
}

/**
 * Intersection of two normalized pointer lists. O(n + m)
 */
export function intersectPointers(a: readonly Pointer[], b: readonly Pointer[]): Pointer[] {
  const out: Pointer[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const cmp = comparePointers(a[i], b[j]);
    if (cmp === 0) {
      out.push(a[i]);
      i++;
      j++;
    } else if (cmp < 0) {
      i++;
    } else {
      j++;
    }
  }
  return out;
}

/**
 * Union of two normalized pointer lists without duplicates. O(n + m)
 */
export function unionPointers(a: readonly Pointer[], b: readonly Pointer[]): Pointer[] {
  const out: Pointer[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length || j < b.length) {
    if (j >= b.length) {
      out.push(a[i++]);
      continue;
    }
    if (i >= a.length) {
      out.push(b[j++]);
      continue;
    }
    const cmp = comparePointers(a[i], b[j]);
    if (cmp === 0) {
      out.push(a[i]);
      i++;
      j++;
    } else if (cmp < 0) {
      out.push(a[i++]);
    } else {
      out.push(b[j++]);
    }
  }
  return out;
}

/**
 * Evaluate a query tree
 * A predicate over a key that has no index matches nothing; it is not an error.
 * @returns Duplicate-free pointers sorted by offset
 * @throws TypeMismatchError if a predicate value's kind differs from its index
 */
export function evaluateQuery(query: PakQuery, source: IndexSource): Pointer[] {
  switch (query.kind) {
    case "predicate": {
      const index = source.index(query.key);
      if (!index) return [];
      return normalizePointers(index.lookup(query.operator, query.value));
    }
    case "and": {
      const left = evaluateQuery(query.left, source);
      // Both sides always run: a type mismatch on either side fails the query
      const right = evaluateQuery(query.right, source);
      return intersectPointers(left, right);
    }
    case "or":
      return unionPointers(evaluateQuery(query.left, source), evaluateQuery(query.right, source));
  }
}

/**
 * Render a query for logs, e.g. `(name = "John" OR age < 28)`
 */
export function describeQuery(query: PakQuery): string {
  switch (query.kind) {
    case "predicate":
      return `${query.key} ${OPERATOR_SYMBOLS[query.operator]} ${formatValue(query.value)}`;
    case "and":
      return `(${describeQuery(query.left)} AND ${describeQuery(query.right)})`;
    case "or":
      return `(${describeQuery(query.left)} OR ${describeQuery(query.right)})`;
  }
}

/**
 * Keys referenced by a query, in first-seen order
 */
export function queryKeys(query: PakQuery): string[] {
  const keys = new Set<string>();
  const visit = (node: PakQuery): void => {
    if (node.kind === "predicate") {
      keys.add(node.key);
    } else {
      visit(node.left);
      visit(node.right);
    }
  };
  visit(query);
  return [...keys];
}
