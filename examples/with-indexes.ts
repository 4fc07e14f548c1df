/**
 * Indexes Example
 *
 * Two record types sharing index keys, queried with trees and filter documents.
 * Run with: npx tsx examples/with-indexes.ts
 */

import { z } from "zod";
import {
  PakBuilder,
  and,
  describeQuery,
  equals,
  greaterThanOrEqual,
  jsonRecord,
  lessThan,
  or,
  parseFilterJSON,
} from "@pakdb/sdk";

const personType = jsonRecord({
  name: "person",
  schema: z.object({ name: z.string(), age: z.number().int() }),
  indices: ["name", "age"],
});

const petType = jsonRecord({
  name: "pet",
  schema: z.object({ name: z.string(), species: z.string(), age: z.number().int() }),
  indices: ["name", "species", "age"],
});

function main() {
  const builder = new PakBuilder({ name: "people-and-pets" });
  builder.pak(personType, { name: "John", age: 30 });
  builder.pak(personType, { name: "Jane", age: 25 });
  builder.pak(personType, { name: "Bob", age: 35 });
  builder.pak(petType, { name: "Rex", species: "dog", age: 3 });
  builder.pak(petType, { name: "Tom", species: "cat", age: 30 });

  const pak = builder.finalizeToMemory();
  console.log(`📦 ${pak.recordCount} records, indexes: ${pak.keys().join(", ")}\n`);

  const adults = and(greaterThanOrEqual("age", 18), lessThan("age", 33));
  console.log(`🔍 ${describeQuery(adults)}`);
  console.log(pak.query(personType, adults));

  // age is shared by both types; queryGroup splits the matches by type
  const thirty = equals("age", 30);
  const [people, pets] = pak.queryGroup(thirty, personType, petType);
  console.log(`\n🔍 ${describeQuery(thirty)}`);
  console.log("   people:", people);
  console.log("   pets:", pets);

  const filter = parseFilterJSON('{"$or":[{"species":"dog"},{"name":{"$gte":"J"}}]}');
  console.log(`\n🔍 ${describeQuery(filter)}`);
  console.log(pak.queryPointers(filter));

  console.log(`\n🔍 ${describeQuery(or(equals("name", "Bob"), equals("name", "Nobody")))}`);
  console.log(pak.queryPointers(or(equals("name", "Bob"), equals("name", "Nobody"))));

  pak.close();
}

main();
