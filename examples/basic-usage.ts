/**
 * Basic Usage Example
 *
 * Packs a few records into an artifact file, reopens it and reads them back.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { Pak, PakBuilder, equals, jsonRecord } from "@pakdb/sdk";

const noteType = jsonRecord({
  name: "note",
  schema: z.object({
    title: z.string(),
    body: z.string(),
    pinned: z.boolean(),
  }),
  indices: ["pinned"],
});

async function main() {
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });
  await mkdir(dataDir, { recursive: true });
  const file = join(dataDir, "notes.pak");

  console.log("✏️  Packing notes...");
  const builder = new PakBuilder({ name: "notes", description: "Example notes" });
  const first = builder.pak(noteType, { title: "Groceries", body: "Eggs, milk", pinned: true });
  builder.pak(noteType, { title: "Ideas", body: "Write more examples", pinned: false });
  builder.pak(noteType, { title: "Reading", body: "Two chapters", pinned: true });

  const pak = await builder.finalizeToFile(file);
  console.log(`✅ Wrote ${pak.recordCount} records (${pak.size} bytes) to ${file}\n`);

  // Pointers returned by the builder stay valid for the finished artifact
  console.log("📖 First note:", pak.get(noteType, first));

  const pinned = pak.query(noteType, equals("pinned", true));
  console.log(`📌 Pinned notes: ${pinned.map((note) => note.title).join(", ")}`);
  pak.close();

  const reopened = Pak.openFile(file, { load: "lazy" });
  console.log("\n📊 Stats:", reopened.stats());
  reopened.close();
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
