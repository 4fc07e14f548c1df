/**
 * Tests for CLI commands, called in process
 */

import { describe, it, expect } from "vitest";
import { join } from "node:path";
import {
  ArtifactNotFoundError,
  formatTypeTag,
  InvalidQueryError,
  PointerOutOfBoundsError,
  TypeMismatchError,
  typeTagOf,
} from "@pakdb/sdk";
import { withTempDir } from "@pakdb/testkit";
import { buildCommand, type BuildOptions } from "../src/commands/build.js";
import { formatInfo, infoCommand } from "../src/commands/info.js";
import { queryCommand } from "../src/commands/query.js";
import { getCommand } from "../src/commands/get.js";
import { CliError } from "../src/lib/errors.js";

const PEOPLE_NDJSON = [
  '{"name":"John","age":30}',
  '{"name":"Jane","age":25}',
  '{"name":"Bob","age":35}',
].join("\n");

const DOCUMENT_TAG = formatTypeTag(typeTagOf("document"));

function options(dir: string, overrides: Partial<BuildOptions> = {}): BuildOptions {
  return { output: join(dir, "people.pak"), type: "document", index: ["name", "age"], ...overrides };
}

describe("CLI commands", () => {
  describe("build", () => {
    it("should pack NDJSON documents", async () => {
      await withTempDir(async (dir) => {
        const result = await buildCommand(PEOPLE_NDJSON, "people.ndjson", options(dir));
        expect(result).toEqual({
          output: join(dir, "people.pak"),
          records: 3,
          // 28 header + 71 data + 111 age + 98 name + 67 directory + 44 footer
          size: 419,
          indexes: ["age", "name"],
        });
      });
    });

    it("should pack a JSON array", async () => {
      await withTempDir(async (dir) => {
        const result = await buildCommand('[{"a":1},{"a":2}]', "in.json", options(dir, { index: ["a"] }));
        expect(result.records).toBe(2);
        expect(result.indexes).toEqual(["a"]);
      });
    });

    it("should report the document that failed", async () => {
      await withTempDir(async (dir) => {
        const build = buildCommand('{"a":1}\n{"a":{"b":2}}', "in.ndjson", options(dir, { index: ["a"] }));
        await expect(build).rejects.toThrow(
          'Document 2 of in.ndjson: Failed to extract indices from record of type "document"'
        );
      });
    });
  });

  describe("info", () => {
    it("should describe the artifact", async () => {
      await withTempDir(async (dir) => {
        const output = join(dir, "people.pak");
        await buildCommand(PEOPLE_NDJSON, "people.ndjson", options(dir, { name: "people", author: "Ann" }));

        const info = infoCommand(output);
        expect(info).toEqual({
          file: output,
          name: "people",
          description: "",
          author: "Ann",
          formatVersion: 1,
          // header grows by the 6 + 3 metadata bytes
          size: 428,
          dataLength: 71,
          records: 3,
          indexes: [
            { key: "age", kind: "number", entryCount: 3, byteLength: 111 },
            { key: "name", kind: "string", entryCount: 3, byteLength: 98 },
          ],
        });

        expect(formatInfo({ ...info, file: "people.pak" })).toEqual([
          "File: people.pak",
          "Format version: 1",
          "Size: 428.00 B",
          "Records: 3 (71.00 B)",
          "Name: people",
          "Author: Ann",
          "Indexes:",
          "  age: 3 entries, number",
          "  name: 3 entries, string",
        ]);
      });
    });

    it("should fail for missing files", () => {
      expect(() => infoCommand("/nonexistent/people.pak")).toThrow(ArtifactNotFoundError);
    });
  });

  describe("query", () => {
    it("should return matching documents and pointers in offset order", async () => {
      await withTempDir(async (dir) => {
        await buildCommand(PEOPLE_NDJSON, "people.ndjson", options(dir));

        const result = queryCommand(join(dir, "people.pak"), {
          filter: '{"age":{"$lt":31}}',
          type: "document",
        });
        expect(result).toEqual({
          keys: ["age"],
          pointers: [
            { offset: 0, length: 24, typeTag: DOCUMENT_TAG },
            { offset: 24, length: 24, typeTag: DOCUMENT_TAG },
          ],
          documents: [
            { name: "John", age: 30 },
            { name: "Jane", age: 25 },
          ],
        });
      });
    });

    it("should apply the limit", async () => {
      await withTempDir(async (dir) => {
        await buildCommand(PEOPLE_NDJSON, "people.ndjson", options(dir));
        const result = queryCommand(join(dir, "people.pak"), {
          filter: '{"$or":[{"name":"Bob"},{"age":25}]}',
          type: "document",
          limit: 1,
        });
        expect(result.documents).toEqual([{ name: "Jane", age: 25 }]);
      });
    });

    it("should leave records undecoded when only pointers are asked for", async () => {
      await withTempDir(async (dir) => {
        await buildCommand(PEOPLE_NDJSON, "people.ndjson", options(dir));
        // decoding as "person" would fail the tag check
        const result = queryCommand(join(dir, "people.pak"), {
          filter: '{"name":"Bob"}',
          type: "person",
          pointers: true,
        });
        expect(result).toEqual({
          keys: ["name"],
          pointers: [{ offset: 48, length: 23, typeTag: DOCUMENT_TAG }],
          documents: [],
        });
      });
    });

    it("should fail for another record type", async () => {
      await withTempDir(async (dir) => {
        await buildCommand(PEOPLE_NDJSON, "people.ndjson", options(dir));
        expect(() =>
          queryCommand(join(dir, "people.pak"), { filter: '{"name":"Bob"}', type: "person" })
        ).toThrow(TypeMismatchError);
      });
    });

    it("should reject malformed filters", () => {
      expect(() => queryCommand("/nonexistent/people.pak", { filter: "{}", type: "document" })).toThrow(
        InvalidQueryError
      );
    });
  });

  describe("get", () => {
    it("should dereference a pointer", async () => {
      await withTempDir(async (dir) => {
        await buildCommand(PEOPLE_NDJSON, "people.ndjson", options(dir));
        expect(getCommand(join(dir, "people.pak"), 24, 24, { type: "document" })).toEqual({
          name: "Jane",
          age: 25,
        });
        expect(
          getCommand(join(dir, "people.pak"), 48, 23, { type: "document", tag: DOCUMENT_TAG.toUpperCase() })
        ).toEqual({ name: "Bob", age: 35 });
      });
    });

    it("should reject pointers of another type or out of range", async () => {
      await withTempDir(async (dir) => {
        const file = join(dir, "people.pak");
        await buildCommand(PEOPLE_NDJSON, "people.ndjson", options(dir));

        expect(() =>
          getCommand(file, 0, 24, { type: "document", tag: formatTypeTag(typeTagOf("person")) })
        ).toThrow(TypeMismatchError);
        expect(() => getCommand(file, 60, 24, { type: "document" })).toThrow(PointerOutOfBoundsError);
        expect(() => getCommand(file, 0, 24, { type: "document", tag: "xyz" })).toThrow(CliError);
      });
    });
  });
});
