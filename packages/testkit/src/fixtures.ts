/**
 * Sample record types shared by the SDK and CLI tests
 */

import { z } from "zod";
import { jsonRecord, type PakCodec } from "@pakdb/sdk";

export const personSchema = z.object({
  name: z.string(),
  age: z.number().int(),
});

export type Person = z.infer<typeof personSchema>;

/** Indexed on "name" and "age" */
export const personType = jsonRecord({
  name: "person",
  schema: personSchema,
  indices: ["name", "age"],
});

export const petSchema = z.object({
  name: z.string(),
  species: z.string(),
  age: z.number().int(),
});

export type Pet = z.infer<typeof petSchema>;

/** Indexed on "name", "species" and "age" */
export const petType = jsonRecord({
  name: "pet",
  schema: petSchema,
  indices: ["name", "species", "age"],
});

export const people: readonly Person[] = [
  { name: "John", age: 30 },
  { name: "Jane", age: 25 },
  { name: "Bob", age: 35 },
];

export const pets: readonly Pet[] = [
  { name: "Rex", species: "dog", age: 3 },
  { name: "Tom", species: "cat", age: 30 },
];

/**
 * Record type storing raw UTF-8 text, indexed on nothing
 */
export const textType: PakCodec<string> = {
  typeName: "text",
  encode: (value) => new TextEncoder().encode(value),
  decode: (bytes) => new TextDecoder().decode(bytes),
};
