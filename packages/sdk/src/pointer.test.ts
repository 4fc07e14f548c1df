import { describe, it, expect } from "vitest";
import {
  comparePointers,
  createPointer,
  decodePointer,
  encodePointer,
  formatTypeTag,
  pointerFromJSON,
  pointerToJSON,
  pointersEqual,
  toSafeNumber,
  typeTagOf,
} from "./pointer.js";

describe("typeTagOf", () => {
  it("should hash with 64-bit FNV-1a", () => {
    expect(typeTagOf("")).toBe(0xcbf29ce484222325n);
    expect(typeTagOf("a")).toBe(0xaf63dc4c8601ec8cn);
  });

  it("should be stable across calls and distinct per name", () => {
    expect(typeTagOf("person")).toBe(typeTagOf("person"));
    expect(typeTagOf("person")).not.toBe(typeTagOf("pet"));
  });
});

describe("formatTypeTag", () => {
  it("should pad to 16 hex digits", () => {
    expect(formatTypeTag(1n)).toBe("0000000000000001");
    expect(formatTypeTag(0xaf63dc4c8601ec8cn)).toBe("af63dc4c8601ec8c");
  });
});

describe("createPointer", () => {
  it("should return a frozen pointer", () => {
    const pointer = createPointer(4, 8, 1n);
    expect(Object.isFrozen(pointer)).toBe(true);
    expect(pointer).toEqual({ offset: 4, length: 8, typeTag: 1n });
  });
});

describe("comparePointers", () => {
  it("should order by offset, then length, then tag", () => {
    const a = createPointer(0, 5, 9n);
    const b = createPointer(0, 6, 1n);
    const c = createPointer(0, 6, 2n);
    const d = createPointer(1, 0, 0n);
    expect([d, c, b, a].sort(comparePointers)).toEqual([a, b, c, d]);
    expect(comparePointers(a, createPointer(0, 5, 9n))).toBe(0);
  });

  it("should compare equality field by field", () => {
    expect(pointersEqual(createPointer(1, 2, 3n), createPointer(1, 2, 3n))).toBe(true);
    expect(pointersEqual(createPointer(1, 2, 3n), createPointer(1, 2, 4n))).toBe(false);
  });
});

describe("binary form", () => {
  it("should write three little-endian u64 values", () => {
    const bytes = encodePointer(createPointer(1, 2, 3n));
    const expected = new Uint8Array(24);
    expected[0] = 1;
    expected[8] = 2;
    expected[16] = 3;
    expect(bytes).toEqual(expected);
  });

  it("should read back what it wrote", () => {
    const pointer = createPointer(1024, 77, typeTagOf("person"));
    expect(decodePointer(encodePointer(pointer))).toEqual(pointer);
  });

  it("should reject short buffers", () => {
    expect(() => decodePointer(new Uint8Array(23))).toThrow(RangeError);
  });

  it("should reject offsets beyond the safe integer range", () => {
    expect(() => toSafeNumber(2n ** 53n, "offset")).toThrow(
      "offset 9007199254740992 exceeds the safe integer range"
    );
    expect(toSafeNumber(2n ** 53n - 1n, "offset")).toBe(Number.MAX_SAFE_INTEGER);
  });
});

describe("JSON form", () => {
  it("should render the tag as hex", () => {
    expect(pointerToJSON(createPointer(3, 4, 255n))).toEqual({
      offset: 3,
      length: 4,
      typeTag: "00000000000000ff",
    });
  });

  it("should parse what it renders", () => {
    const pointer = createPointer(48, 23, typeTagOf("pet"));
    expect(pointerFromJSON(pointerToJSON(pointer))).toEqual(pointer);
  });

  it("should reject malformed objects", () => {
    expect(() => pointerFromJSON({ offset: -1, length: 0, typeTag: "0000000000000000" })).toThrow(
      TypeError
    );
    expect(() => pointerFromJSON({ offset: 0, length: 1.5, typeTag: "0000000000000000" })).toThrow(
      TypeError
    );
    expect(() => pointerFromJSON({ offset: 0, length: 0, typeTag: "xyz" })).toThrow(
      "Invalid pointer type tag: xyz"
    );
  });
});
