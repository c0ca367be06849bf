import { describe, it, expect } from "vitest";
import { z } from "zod";

import { TypeMismatchError } from "../src/errors";
import { projectObject, propertiesFromSchema, returnShape } from "../src/result/projection";
import type { ResultObject } from "../src/types";

function object(overrides: Partial<ResultObject> = {}): ResultObject {
  return {
    uuid: "obj-1",
    collection: "Article",
    properties: {},
    metadata: { distance: 0.25 },
    references: {},
    vectors: {},
    ...overrides,
  };
}

function mismatch(fn: () => unknown): TypeMismatchError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TypeMismatchError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a TypeMismatchError");
}

const Article = z.object({ title: z.string(), year: z.number() });

describe("projectObject", () => {
  it("parses properties into the declared shape and keeps the rest", () => {
    const projected = projectObject(object({ properties: { title: "Rivers", year: 2001, extra: true } }), returnShape(Article));

    expect(projected.properties).toEqual({ title: "Rivers", year: 2001 });
    expect(projected.uuid).toBe("obj-1");
    expect(projected.metadata).toEqual({ distance: 0.25 });
  });

  it("names the offending field", () => {
    const error = mismatch(() =>
      projectObject(object({ properties: { title: "Rivers", year: "2001" } }), returnShape(Article))
    );

    expect(error.field).toBe("year");
    expect(error.message).toBe("Property 'year' does not match the return type: Expected number, received string");
  });

  it("uses a dotted path for nested fields", () => {
    const shape = returnShape(z.object({ address: z.object({ city: z.string() }) }));

    const error = mismatch(() => projectObject(object({ properties: { address: { city: 5 } } }), shape));

    expect(error.field).toBe("address.city");
  });

  describe("references", () => {
    const withAuthor = object({
      properties: { title: "Rivers", year: 2001 },
      references: {
        author: { objects: [object({ uuid: "p-1", collection: "Person", properties: { name: "Ann" } })] },
        reviewer: { objects: [object({ uuid: "p-2", collection: "Person", properties: { name: "Bob" } })] },
      },
    });

    it("projects declared references and drops the others", () => {
      const projected = projectObject(withAuthor, returnShape(Article, { author: z.object({ name: z.string() }) }));

      expect(Object.keys(projected.references)).toEqual(["author"]);
      expect(projected.references.author?.objects[0].properties).toEqual({ name: "Ann" });
    });

    it("prefixes reference mismatches with the link name", () => {
      const shape = returnShape(Article, { author: z.object({ name: z.number() }) });

      expect(mismatch(() => projectObject(withAuthor, shape)).field).toBe("author.name");
    });
  });
});

describe("propertiesFromSchema", () => {
  it("selects the keys of an object schema, nested objects by their own keys", () => {
    const schema = z.object({
      title: z.string(),
      address: z.object({ city: z.string(), zip: z.string().optional() }).optional(),
      items: z.array(z.object({ label: z.string() })),
      tags: z.array(z.string()),
    });

    expect(propertiesFromSchema(schema)).toEqual([
      "title",
      { name: "address", properties: ["city", "zip"] },
      { name: "items", properties: ["label"] },
      "tags",
    ]);
  });

  it("leaves the selection open for non-object schemas", () => {
    expect(propertiesFromSchema(z.record(z.string()))).toBeUndefined();
  });
});
