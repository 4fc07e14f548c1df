/**
 * Performance benchmarks for building and querying artifacts
 * Run with: PAKDB_PERF=1 npm test
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { join } from "node:path";
import { z } from "zod";
import { createTempDir, removeDir } from "@pakdb/testkit";
import { PakBuilder } from "../src/builder.js";
import { Pak } from "../src/reader.js";
import { jsonRecord } from "../src/records.js";
import { and, equals, greaterThanOrEqual, lessThan, or } from "../src/query.js";

// Only run benchmarks if PAKDB_PERF is set
const describeIf = process.env.PAKDB_PERF ? describe : describe.skip;

const taskType = jsonRecord({
  name: "task",
  schema: z.object({
    id: z.number().int(),
    status: z.enum(["open", "ready", "closed"]),
    priority: z.number().int(),
    title: z.string(),
  }),
  indices: ["id", "status", "priority"],
});

const COUNT = 50_000;

describeIf("Query Performance Benchmarks", () => {
  let testDir: string;
  let file: string;

  beforeAll(async () => {
    testDir = await createTempDir("pakdb-bench-");
    file = join(testDir, "tasks.pak");

    const start = Date.now();
    const builder = new PakBuilder({ name: "tasks" });
    for (let i = 0; i < COUNT; i++) {
      builder.pak(taskType, {
        id: i,
        status: i % 3 === 0 ? "open" : i % 3 === 1 ? "closed" : "ready",
        priority: (i * 7) % 10,
        title: `Task ${i}`,
      });
    }
    const pak = await builder.finalizeToFile(file);
    pak.close();
    console.log(`Built ${COUNT} records in ${Date.now() - start}ms`);
  }, 120_000);

  afterAll(async () => {
    await removeDir(testDir);
  });

  it(`${COUNT} records, equality on a cold index < 200ms`, { timeout: 30000 }, () => {
    const pak = Pak.openFile(file);
    try {
      const start = Date.now();
      const pointers = pak.queryPointers(equals("status", "open"));
      const duration = Date.now() - start;

      console.log(`Equality: ${pointers.length} matches in ${duration}ms`);
      expect(pointers.length).toBe(Math.ceil(COUNT / 3));
      expect(duration).toBeLessThanOrEqual(200);
    } finally {
      pak.close();
    }
  });

  it(`${COUNT} records, warm range AND/OR < 50ms`, { timeout: 30000 }, () => {
    const pak = Pak.openFile(file, { preloadIndexes: true });
    try {
      const query = or(
        and(equals("status", "ready"), greaterThanOrEqual("priority", 8)),
        lessThan("id", 100)
      );
      pak.queryPointers(query);

      const start = Date.now();
      const pointers = pak.queryPointers(query);
      const duration = Date.now() - start;

      console.log(`Range AND/OR: ${pointers.length} matches in ${duration}ms`);
      expect(pointers.length).toBeGreaterThan(100);
      expect(duration).toBeLessThanOrEqual(50);
    } finally {
      pak.close();
    }
  });

  it(`${COUNT} records, decoding 1000 matches < 100ms`, { timeout: 30000 }, () => {
    const pak = Pak.openFile(file, { load: "lazy" });
    try {
      const start = Date.now();
      const tasks = pak.query(taskType, lessThan("id", 1000));
      const duration = Date.now() - start;

      console.log(`Decode: ${tasks.length} records in ${duration}ms`);
      expect(tasks).toHaveLength(1000);
      expect(duration).toBeLessThanOrEqual(100);
    } finally {
      pak.close();
    }
  });
});
