import { describe, it, expect } from "vitest";
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { people, personType, pets, petType, textType, withTempDir } from "@pakdb/testkit";
import { PakBuilder } from "./builder.js";
import { BuildError, EncodeError, IndexExtractionError, TypeMismatchError } from "./errors.js";
import { typeTagOf } from "./pointer.js";
import { equals } from "./query.js";
import type { PakCodec, PakIndexField, PakRecordType } from "./types.js";

function buildPeople(): Uint8Array {
  const builder = new PakBuilder();
  for (const person of people) builder.pak(personType, person);
  return builder.finalizeToBuffer();
}

/** Record type over plain text with a caller-supplied extractor */
function textWith(indices: (value: string) => Iterable<PakIndexField>): PakRecordType<string> {
  return { ...textType, indices };
}

describe("PakBuilder", () => {
  describe("pak", () => {
    it("should return pointers to consecutive byte ranges", () => {
      const builder = new PakBuilder();
      const john = builder.pak(personType, { name: "John", age: 30 });
      const jane = builder.pak(personType, { name: "Jane", age: 25 });

      // {"age":30,"name":"John"} is 24 bytes
      expect(john).toEqual({ offset: 0, length: 24, typeTag: typeTagOf("person") });
      expect(jane).toEqual({ offset: 24, length: 24, typeTag: typeTagOf("person") });
      expect(builder.size).toBe(48);
      expect(builder.length).toBe(2);
    });

    it("should tag pointers with their record type", () => {
      const builder = new PakBuilder();
      expect(builder.pak(petType, { name: "Rex", species: "dog", age: 3 }).typeTag).toBe(
        typeTagOf("pet")
      );
    });

    it("should store zero-length records", () => {
      const builder = new PakBuilder();
      const pointer = builder.pakNoSearch(textType, "");
      expect(pointer.length).toBe(0);
      const pak = builder.finalizeToMemory();
      expect(pak.get(textType, pointer)).toBe("");
    });

    it("should index every element of an array value", () => {
      const builder = new PakBuilder();
      const tagged = textWith(() => [["tag", ["red", "blue"]]]);
      const pointer = builder.pak(tagged, "shirt");
      const pak = builder.finalizeToMemory();

      expect(pak.queryPointers(equals("tag", "red"))).toEqual([pointer]);
      expect(pak.queryPointers(equals("tag", "blue"))).toEqual([pointer]);
    });

    it("should skip null and undefined values", () => {
      const builder = new PakBuilder();
      builder.pak(
        textWith(() => [
          ["a", null],
          ["b", undefined],
        ]),
        "x"
      );
      expect(builder.finalizeToMemory().keys()).toEqual([]);
    });
  });

  describe("pakNoSearch", () => {
    it("should store the record without index entries", () => {
      const builder = new PakBuilder();
      const pointer = builder.pakNoSearch(personType, { name: "John", age: 30 });
      const pak = builder.finalizeToMemory();

      expect(pak.queryPointers(equals("name", "John"))).toEqual([]);
      expect(pak.get(personType, pointer)).toEqual({ name: "John", age: 30 });
    });
  });

  describe("failures", () => {
    const failing: PakCodec<string> = {
      typeName: "failing",
      encode: () => {
        throw new Error("boom");
      },
      decode: () => "",
    };

    it("should wrap encoder failures in EncodeError", () => {
      const builder = new PakBuilder();
      expect(() => builder.pak(failing, "x")).toThrow(EncodeError);
      expect(() => builder.pak(failing, "x")).toThrow('Failed to encode record of type "failing"');
    });

    it("should wrap schema failures in EncodeError", () => {
      const builder = new PakBuilder();
      expect(() => builder.pak(personType, { name: "John", age: 30.5 })).toThrow(EncodeError);
      expect(builder.length).toBe(0);
    });

    it("should wrap extractor failures in IndexExtractionError", () => {
      const builder = new PakBuilder();
      const throwing = textWith(() => {
        throw new Error("nope");
      });
      expect(() => builder.pak(throwing, "x")).toThrow(IndexExtractionError);
    });

    it("should reject unindexable values", () => {
      const builder = new PakBuilder();
      expect(() => builder.pak(textWith(() => [["n", Number.NaN]]), "x")).toThrow(
        'value for key "n" cannot be indexed'
      );
      expect(() => builder.pak(textWith(() => [["", 1]]), "x")).toThrow(IndexExtractionError);
    });

    it("should leave the builder unchanged after a failed call", () => {
      const builder = new PakBuilder();
      builder.pak(personType, people[0]);
      expect(() => builder.pak(failing, "x")).toThrow(EncodeError);
      expect(() =>
        builder.pak(
          textWith(() => [
            ["name", "ok"],
            ["age", Number.NaN],
          ]),
          "x"
        )
      ).toThrow(IndexExtractionError);
      for (const person of people.slice(1)) builder.pak(personType, person);

      expect(builder.length).toBe(3);
      expect(builder.finalizeToBuffer()).toEqual(buildPeople());
    });

    it("should reject an empty type name", () => {
      const builder = new PakBuilder();
      expect(() => builder.pakNoSearch({ ...textType, typeName: "" }, "x")).toThrow(BuildError);
    });

    it("should fail finalize when one key holds values of different kinds", () => {
      const builder = new PakBuilder();
      builder.pak(personType, { name: "John", age: 30 });
      builder.pak(textWith(() => [["age", "thirty"]]), "x");
      expect(() => builder.finalizeToBuffer()).toThrow(TypeMismatchError);
    });

    it("should allow record types to share a key when kinds agree", () => {
      const builder = new PakBuilder();
      for (const person of people) builder.pak(personType, person);
      for (const pet of pets) builder.pak(petType, pet);
      expect(builder.finalizeToMemory().describeIndex("age")?.entryCount).toBe(5);
    });
  });

  describe("finalize", () => {
    it("should produce byte-identical artifacts for identical input", () => {
      expect(buildPeople()).toEqual(buildPeople());
    });

    it("should lay out header, data, indexes, directory and footer", () => {
      const builder = new PakBuilder();
      builder.pak(personType, { name: "John", age: 30 });
      builder.pak(personType, { name: "Jane", age: 25 });
      const bytes = builder.finalizeToBuffer();

      // 28 header + 48 data + 74 age index + 66 name index + 67 directory + 44 footer
      expect(bytes.length).toBe(327);
      expect(bytes.subarray(0, 8)).toEqual(Uint8Array.of(0x50, 0x41, 0x4b, 0x44, 0x42, 0, 0x0d, 0x0a));
      // footer data_offset (u64 LE) points just past the header
      expect(bytes[327 - 44]).toBe(28);
    });

    it("should be single-use", () => {
      const builder = new PakBuilder();
      builder.finalizeToBuffer();
      expect(() => builder.finalizeToBuffer()).toThrow("Builder has already been finalized");
      expect(() => builder.pak(personType, people[0])).toThrow(BuildError);
    });

    it("should carry metadata into the header", () => {
      const builder = new PakBuilder({ name: "zoo" })
        .setDescription("animals")
        .setAuthor("Zoë");
      const pak = builder.finalizeToMemory();
      expect(pak.metadata).toEqual({ name: "zoo", description: "animals", author: "Zoë" });
    });

    it("should publish a file atomically and open it", async () => {
      await withTempDir(async (dir) => {
        const path = join(dir, "nested", "people.pak");
        const builder = new PakBuilder();
        for (const person of people) builder.pak(personType, person);
        const pak = await builder.finalizeToFile(path);

        expect(pak.query(personType, equals("name", "Bob"))).toEqual([{ name: "Bob", age: 35 }]);
        expect(await readdir(join(dir, "nested"))).toEqual(["people.pak"]);
        pak.close();
      });
    });

    it("should fail with BuildError when the target cannot be written", async () => {
      await withTempDir(async (dir) => {
        const builder = new PakBuilder();
        await expect(builder.finalizeToFile(dir)).rejects.toThrow(BuildError);
        expect(await readdir(dir)).toEqual([]);
      });
    });
  });
});
