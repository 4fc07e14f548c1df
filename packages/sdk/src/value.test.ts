import { describe, it, expect } from "vitest";
import {
  compareEncoded,
  decodeValue,
  encodeValue,
  formatValue,
  isPakValue,
  kindOf,
  kindOfEncoded,
} from "./value.js";
import type { PakValue } from "./types.js";

function sortByEncoding(values: PakValue[]): PakValue[] {
  return [...values].sort((a, b) => compareEncoded(encodeValue(a), encodeValue(b)));
}

describe("encodeValue", () => {
  it("should encode booleans as kind byte plus 0 or 1", () => {
    expect(encodeValue(false)).toEqual(Uint8Array.of(0x10, 0));
    expect(encodeValue(true)).toEqual(Uint8Array.of(0x10, 1));
  });

  it("should encode numbers as sign-flipped big-endian doubles", () => {
    expect(encodeValue(1)).toEqual(Uint8Array.of(0x20, 0xbf, 0xf0, 0, 0, 0, 0, 0, 0));
  });

  it("should encode bigints as offset big-endian int64", () => {
    expect(encodeValue(0n)).toEqual(Uint8Array.of(0x30, 0x80, 0, 0, 0, 0, 0, 0, 0));
  });

  it("should encode strings as kind byte plus UTF-8", () => {
    expect(encodeValue("")).toEqual(Uint8Array.of(0x40));
    expect(encodeValue("hi")).toEqual(Uint8Array.of(0x40, 0x68, 0x69));
  });

  it("should fold -0 into 0", () => {
    expect(encodeValue(-0)).toEqual(encodeValue(0));
  });

  it("should reject NaN", () => {
    expect(() => encodeValue(Number.NaN)).toThrow(RangeError);
  });

  it("should reject bigints outside int64", () => {
    expect(() => encodeValue(2n ** 63n)).toThrow(RangeError);
    expect(() => encodeValue(-(2n ** 63n) - 1n)).toThrow(RangeError);
  });
});

describe("canonical order", () => {
  it("should order numbers numerically", () => {
    const values = [2.5, -Infinity, 1, -1.5, Infinity, 0, -1e300, 1e-300];
    expect(sortByEncoding(values)).toEqual([-Infinity, -1e300, -1.5, 0, 1e-300, 1, 2.5, Infinity]);
  });

  it("should order bigints numerically across the sign boundary", () => {
    const values = [1n, -(2n ** 63n), 2n ** 63n - 1n, -1n, 0n];
    expect(sortByEncoding(values)).toEqual([-(2n ** 63n), -1n, 0n, 1n, 2n ** 63n - 1n]);
  });

  it("should order strings by code point with prefixes first", () => {
    const values = ["b", "ab", "é", "", "a", "Z"];
    expect(sortByEncoding(values)).toEqual(["", "Z", "a", "ab", "b", "é"]);
  });

  it("should order kinds boolean < number < bigint < string", () => {
    expect(sortByEncoding(["a", 1n, 1, true])).toEqual([true, 1, 1n, "a"]);
  });
});

describe("decodeValue", () => {
  it("should decode each kind", () => {
    expect(decodeValue(encodeValue(true))).toBe(true);
    expect(decodeValue(encodeValue(-42.25))).toBe(-42.25);
    expect(decodeValue(encodeValue(-7n))).toBe(-7n);
    expect(decodeValue(encodeValue("héllo"))).toBe("héllo");
  });

  it("should reject unknown kind bytes", () => {
    expect(() => decodeValue(Uint8Array.of(0x99))).toThrow(RangeError);
  });

  it("should reject malformed encodings", () => {
    expect(() => decodeValue(Uint8Array.of(0x10, 2))).toThrow(RangeError);
    expect(() => decodeValue(Uint8Array.of(0x20, 0))).toThrow(RangeError);
  });
});

describe("kinds", () => {
  it("should report the kind of values and encodings", () => {
    expect(kindOf(3)).toBe("number");
    expect(kindOf(3n)).toBe("bigint");
    expect(kindOfEncoded(encodeValue("x"))).toBe("string");
    expect(kindOfEncoded(new Uint8Array(0))).toBeUndefined();
  });

  it("should reject unsupported values", () => {
    expect(() => kindOf(null)).toThrow("Unsupported index value of type null");
    expect(() => kindOf([1])).toThrow("Unsupported index value of type array");
    expect(isPakValue({})).toBe(false);
    expect(isPakValue(false)).toBe(true);
  });
});

describe("formatValue", () => {
  it("should quote strings and suffix bigints", () => {
    expect(formatValue("John")).toBe('"John"');
    expect(formatValue(5n)).toBe("5n");
    expect(formatValue(28)).toBe("28");
    expect(formatValue(false)).toBe("false");
  });
});
