import { describe, it, expect } from "vitest";
import {
  and,
  describeQuery,
  equals,
  evaluateQuery,
  greaterThan,
  greaterThanOrEqual,
  intersectPointers,
  lessThan,
  lessThanOrEqual,
  normalizePointers,
  or,
  queryKeys,
  unionPointers,
  type IndexSource,
  type PakQuery,
} from "./query.js";
import { InvalidQueryError, TypeMismatchError } from "./errors.js";
import { PakIndex, compareEntries } from "./indexes.js";
import { createPointer } from "./pointer.js";
import { encodeValue } from "./value.js";
import type { PakValue, Pointer } from "./types.js";

const p = (offset: number): Pointer => createPointer(offset, 1, 1n);

/**
 * In-memory index source: one record per offset, each with a name and an age
 */
function sourceOf(records: Array<{ name: string; age: number }>): IndexSource {
  const build = (key: string, pick: (r: { name: string; age: number }) => PakValue) => {
    const entries = records
      .map((r, i) => ({ value: encodeValue(pick(r)), pointer: p(i) }))
      .sort(compareEntries);
    return new PakIndex({ key, entryCount: entries.length, byteLength: 0 }, () => entries);
  };
  const indexes = new Map([
    ["name", build("name", (r) => r.name)],
    ["age", build("age", (r) => r.age)],
  ]);
  return { index: (key) => indexes.get(key) };
}

const source = sourceOf([
  { name: "John", age: 30 },
  { name: "Jane", age: 25 },
  { name: "Bob", age: 35 },
  { name: "John", age: 41 },
  { name: "Ann", age: 19 },
]);

const run = (query: PakQuery): number[] => evaluateQuery(query, source).map((ptr) => ptr.offset);

describe("query constructors", () => {
  it("should build frozen predicate leaves", () => {
    const node = equals("name", "John");
    expect(node).toEqual({ kind: "predicate", key: "name", operator: "eq", value: "John" });
    expect(Object.isFrozen(node)).toBe(true);
    expect(lessThan("a", 1).operator).toBe("lt");
    expect(lessThanOrEqual("a", 1).operator).toBe("lte");
    expect(greaterThan("a", 1).operator).toBe("gt");
    expect(greaterThanOrEqual("a", 1).operator).toBe("gte");
  });

  it("should fold extra operands to the left", () => {
    const a = equals("a", 1);
    const b = equals("b", 2);
    const c = equals("c", 3);
    expect(and(a, b, c)).toEqual({
      kind: "and",
      left: { kind: "and", left: a, right: b },
      right: c,
    });
    expect(or(a, b, c)).toEqual({
      kind: "or",
      left: { kind: "or", left: a, right: b },
      right: c,
    });
  });

  it("should reject invalid keys and values", () => {
    expect(() => equals("", 1)).toThrow(InvalidQueryError);
    expect(() => equals("age", Number.NaN)).toThrow(InvalidQueryError);
    expect(() => equals("age", 2n ** 64n)).toThrow(InvalidQueryError);
  });
});

describe("describeQuery", () => {
  it("should render nested trees with parentheses", () => {
    expect(describeQuery(equals("name", "John"))).toBe('name = "John"');
    expect(describeQuery(or(equals("name", "John"), lessThan("age", 28)))).toBe(
      '(name = "John" OR age < 28)'
    );
    expect(
      describeQuery(and(greaterThanOrEqual("age", 18n), or(equals("a", true), lessThanOrEqual("b", 2))))
    ).toBe("(age >= 18n AND (a = true OR b <= 2))");
  });

  it("should list referenced keys once", () => {
    expect(queryKeys(and(equals("a", 1), or(equals("b", 1), equals("a", 2))))).toEqual(["a", "b"]);
  });
});

describe("pointer set operations", () => {
  it("should sort and deduplicate", () => {
    expect(normalizePointers([p(3), p(1), p(3), p(2)])).toEqual([p(1), p(2), p(3)]);
  });

  it("should intersect sorted lists", () => {
    expect(intersectPointers([p(1), p(3), p(5)], [p(3), p(4), p(5), p(6)])).toEqual([p(3), p(5)]);
    expect(intersectPointers([], [p(1)])).toEqual([]);
  });

  it("should union sorted lists without duplicates", () => {
    expect(unionPointers([p(1), p(3)], [p(2), p(3), p(7)])).toEqual([p(1), p(2), p(3), p(7)]);
    expect(unionPointers([], [])).toEqual([]);
  });

  it("should treat pointers with different tags as distinct", () => {
    const a = createPointer(0, 0, 1n);
    const b = createPointer(0, 0, 2n);
    expect(unionPointers([a], [b])).toEqual([a, b]);
    expect(intersectPointers([a], [b])).toEqual([]);
  });
});

describe("evaluateQuery", () => {
  it("should evaluate predicates", () => {
    expect(run(equals("name", "John"))).toEqual([0, 3]);
    expect(run(lessThan("age", 28))).toEqual([1, 4]);
    expect(run(greaterThan("age", 30))).toEqual([2, 3]);
    expect(run(greaterThanOrEqual("name", "Jo"))).toEqual([0, 3]);
  });

  it("should return each match once", () => {
    expect(run(or(equals("name", "John"), greaterThan("age", 29)))).toEqual([0, 2, 3]);
  });

  it("should match nothing for keys without an index", () => {
    expect(run(equals("color", "red"))).toEqual([]);
    expect(run(or(equals("color", "red"), equals("name", "Bob")))).toEqual([2]);
    expect(run(and(equals("color", "red"), equals("name", "Bob")))).toEqual([]);
  });

  it("should fail when a predicate value has the wrong kind", () => {
    expect(() => run(equals("age", "30"))).toThrow(TypeMismatchError);
  });

  it("should evaluate both sides of AND even when one side is empty", () => {
    expect(() => run(and(equals("color", "red"), equals("age", "x")))).toThrow(TypeMismatchError);
  });

  describe("boolean laws", () => {
    const A = equals("name", "John");
    const B = lessThan("age", 31);
    const C = greaterThan("age", 20);

    it("should compute OR as union and AND as intersection", () => {
      const a = evaluateQuery(A, source);
      const b = evaluateQuery(B, source);
      expect(evaluateQuery(or(A, B), source)).toEqual(unionPointers(a, b));
      expect(evaluateQuery(and(A, B), source)).toEqual(intersectPointers(a, b));
    });

    it("should be commutative", () => {
      expect(run(or(A, B))).toEqual(run(or(B, A)));
      expect(run(and(A, B))).toEqual(run(and(B, A)));
    });

    it("should be associative", () => {
      expect(run(or(or(A, B), C))).toEqual(run(or(A, or(B, C))));
      expect(run(and(and(A, B), C))).toEqual(run(and(A, and(B, C))));
    });

    it("should be distributive", () => {
      expect(run(and(A, or(B, C)))).toEqual(run(or(and(A, B), and(A, C))));
      expect(run(or(A, and(B, C)))).toEqual(run(and(or(A, B), or(A, C))));
      expect(run(and(B, or(A, C)))).toEqual(run(or(and(B, A), and(B, C))));
      expect(run(or(B, and(A, C)))).toEqual(run(and(or(B, A), or(B, C))));
    });

    it("should be idempotent and absorptive", () => {
      expect(run(or(A, A))).toEqual(run(A));
      expect(run(and(A, A))).toEqual(run(A));
      expect(run(or(A, and(A, B)))).toEqual(run(A));
      expect(run(and(A, or(A, B)))).toEqual(run(A));
    });
  });
});
