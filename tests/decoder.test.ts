/**
 * Result decoder tests. Replies are built as plain objects and validated with
 * the reply schema, except where the wire encoding itself matters.
 */

import { afterEach, describe, it, expect, vi } from "vitest";
import { z } from "zod";

import { getLogger } from "../src/logger";
import { decodeSearchReply, encodeSearchReply } from "../src/proto/codec";
import { packFloat32, packFloat64, packInt64 } from "../src/proto/packing";
import { SearchReplySchema, type SearchReply } from "../src/proto/schema";
import { decodeQueryReply, type DecodeOptions } from "../src/result/decoder";
import { projectGroupByReturn, returnShape } from "../src/result/projection";
import type { GroupByReturn, QueryReturn } from "../src/types";

function reply(raw: Record<string, unknown>): SearchReply {
  return SearchReplySchema.parse(raw);
}

function objects(raw: Record<string, unknown>, options: Partial<DecodeOptions> = {}): QueryReturn {
  const decoded = decodeQueryReply(reply(raw), { collection: "Article", ...options });
  if (decoded.kind !== "objects") {
    throw new Error("expected a flat result");
  }
  return decoded.result;
}

function groups(raw: Record<string, unknown>, options: Partial<DecodeOptions>): GroupByReturn {
  const decoded = decodeQueryReply(reply(raw), { collection: "Article", ...options });
  if (decoded.kind !== "groups") {
    throw new Error("expected a grouped result");
  }
  return decoded.result;
}

function result(fields: Record<string, unknown>, metadata?: Record<string, unknown>): Record<string, unknown> {
  return { properties: { nonRefProps: { fields } }, metadata };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("decodeQueryReply", () => {
  it("decodes the vector search example in server order", () => {
    const bytes = encodeSearchReply({
      results: [
        { properties: {}, metadata: { id: "obj-1", distance: 0.12, distancePresent: true } },
        { properties: {}, metadata: { id: "obj-2", distance: 0.34, distancePresent: true } },
      ],
    });

    const decoded = decodeQueryReply(decodeSearchReply(bytes), { collection: "Article" });

    expect(decoded.kind).toBe("objects");
    const out = decoded.result.objects;
    expect(out.map((o) => o.uuid)).toEqual(["obj-1", "obj-2"]);
    expect(Object.keys(out[0].metadata)).toEqual(["distance"]);
    expect(out[0].metadata.distance).toBeCloseTo(0.12, 6);
    expect(out[1].metadata.distance).toBeCloseTo(0.34, 6);
    expect(out[0].properties).toEqual({});
    expect(out[1].properties).toEqual({});
  });

  describe("metadata", () => {
    it("treats a present flag without a value as zero", () => {
      const out = objects({ results: [result({}, { id: "obj-1", distancePresent: true, scorePresent: true })] });

      expect(out.objects[0].metadata).toEqual({ distance: 0, score: 0 });
    });

    it("ignores values whose present flag is unset", () => {
      const out = objects({ results: [result({}, { id: "obj-1", distance: 0.3, certainty: 0.9 })] });

      expect(out.objects[0].metadata).toEqual({});
    });

    it("converts timestamps and keeps the rest as sent", () => {
      const out = objects({
        results: [
          result(
            {},
            {
              id: "obj-1",
              creationTimeUnix: 1700000000000,
              creationTimeUnixPresent: true,
              lastUpdateTimeUnixPresent: true,
              explainScore: "bm25",
              explainScorePresent: true,
              isConsistent: true,
              isConsistentPresent: true,
              rerankScore: 1.25,
              rerankScorePresent: true,
            }
          ),
        ],
      });

      expect(out.objects[0].metadata).toEqual({
        creationTime: new Date(1700000000000),
        lastUpdateTime: new Date(0),
        explainScore: "bm25",
        isConsistent: true,
        rerankScore: 1.25,
      });
    });

    it("reads the id from raw bytes and leaves it out when absent", () => {
      const idAsBytes = Uint8Array.from({ length: 16 }, (_, i) => i);
      const out = objects({ results: [result({}, { idAsBytes }), result({})] });

      expect(out.objects[0].uuid).toBe("00010203-0405-0607-0809-0a0b0c0d0e0f");
      expect("uuid" in out.objects[1]).toBe(false);
      expect(out.objects[1].metadata).toEqual({});
    });
  });

  describe("properties", () => {
    it("decodes every typed value kind", () => {
      const out = objects({
        results: [
          result({
            title: { textValue: "Rivers" },
            legacyTitle: { stringValue: "Old" },
            count: { intValue: 3 },
            rating: { numberValue: 2.5 },
            published: { boolValue: true },
            date: { dateValue: "2024-01-02T00:00:00Z" },
            ref: { uuidValue: "obj-7" },
            location: { geoValue: { latitude: 52.5, longitude: 13.25 } },
            phone: { phoneValue: { input: "020 1234", countryCode: 31, valid: true } },
            summary: { nullValue: 0 },
            address: { objectValue: { fields: { city: { textValue: "Oslo" } } } },
            scores: { listValue: { numberValues: { values: packFloat64([1.5, 2.5]) } } },
            ids: { listValue: { intValues: { values: packInt64([4, 5]) } } },
            words: { listValue: { textValues: { values: ["a", "b"] } } },
            flags: { listValue: { boolValues: { values: [true, false] } } },
            dates: { listValue: { dateValues: { values: ["2020-06-01T00:00:00Z"] } } },
            items: { listValue: { objectValues: { values: [{ fields: { label: { textValue: "x" } } }] } } },
            empty: { listValue: {} },
          }),
        ],
      });

      expect(out.objects[0].properties).toEqual({
        title: "Rivers",
        legacyTitle: "Old",
        count: 3,
        rating: 2.5,
        published: true,
        date: new Date("2024-01-02T00:00:00Z"),
        ref: "obj-7",
        location: { latitude: 52.5, longitude: 13.25 },
        phone: { number: "020 1234", countryCode: 31, valid: true },
        summary: null,
        address: { city: "Oslo" },
        scores: [1.5, 2.5],
        ids: [4, 5],
        words: ["a", "b"],
        flags: [true, false],
        dates: [new Date("2020-06-01T00:00:00Z")],
        items: [{ label: "x" }],
        empty: [],
      });
    });

    it("decodes the legacy struct and typed array encoding", () => {
      const out = objects({
        results: [
          {
            properties: {
              nonRefProperties: {
                fields: {
                  title: { stringValue: "Old" },
                  count: { numberValue: 3 },
                  missing: { nullValue: 0 },
                  tags: { listValue: { values: [{ stringValue: "x" }] } },
                },
              },
              intArrayProperties: [{ propName: "ints", values: [1, 2] }],
              numberArrayProperties: [{ propName: "scores", valuesBytes: packFloat64([0.5]) }],
              textArrayProperties: [{ propName: "words", values: ["a"] }],
              booleanArrayProperties: [{ propName: "flags", values: [true] }],
              objectProperties: [
                { propName: "address", value: { nonRefProperties: { fields: { city: { stringValue: "Oslo" } } } } },
              ],
              objectArrayProperties: [
                { propName: "items", values: [{ textArrayProperties: [{ propName: "labels", values: ["l"] }] }] },
              ],
            },
          },
        ],
      });

      expect(out.objects[0].properties).toEqual({
        title: "Old",
        count: 3,
        missing: null,
        tags: ["x"],
        ints: [1, 2],
        scores: [0.5],
        words: ["a"],
        flags: [true],
        address: { city: "Oslo" },
        items: [{ labels: ["l"] }],
      });
    });

    it("drops blobs that were not asked for by name", () => {
      const warn = vi.spyOn(getLogger(), "warn").mockImplementation(() => undefined);
      const raw = { results: [result({ title: { textValue: "Rivers" }, image: { blobValue: "aGk=" } })] };

      expect(objects(raw).objects[0].properties).toEqual({ title: "Rivers" });
      expect(warn).toHaveBeenCalledWith("Dropped blob properties that were not requested", { properties: ["image"] });

      expect(objects(raw, { returnProperties: ["title", "image"] }).objects[0].properties).toEqual({
        title: "Rivers",
        image: "aGk=",
      });
    });
  });

  describe("vectors", () => {
    it("returns named vectors, the unnamed one as default", () => {
      const out = objects(
        {
          results: [
            result(
              {},
              {
                id: "obj-1",
                vectorBytes: packFloat32([0.5, 0.25]),
                vectors: [
                  { name: "title", vectorBytes: packFloat32([1, 2]) },
                  { name: "", vectorBytes: packFloat32([0.75]) },
                ],
              }
            ),
          ],
        },
        { includeVector: true }
      );

      expect(out.objects[0].vectors).toEqual({ title: [1, 2], default: [0.75] });
    });

    it("falls back to the single vector fields", () => {
      const withBytes = objects(
        { results: [result({}, { id: "obj-1", vectorBytes: packFloat32([0.5, 0.25]) })] },
        { includeVector: true }
      );
      const withList = objects({ results: [result({}, { id: "obj-1", vector: [0.5] })] }, { includeVector: true });

      expect(withBytes.objects[0].vectors).toEqual({ default: [0.5, 0.25] });
      expect(withList.objects[0].vectors).toEqual({ default: [0.5] });
    });

    it("leaves vectors out unless they were included", () => {
      const out = objects({ results: [result({}, { id: "obj-1", vectorBytes: packFloat32([0.5]) })] });

      expect(out.objects[0].vectors).toEqual({});
    });
  });

  it("attaches generated text per object and per reply", () => {
    const out = objects({
      results: [result({}, { id: "obj-1", generative: "A summary", generativePresent: true }), result({})],
      generativeGroupedResult: "All of them",
    });

    expect(out.objects[0].generated).toBe("A summary");
    expect(out.objects[1].generated).toBeUndefined();
    expect(out.generated).toBe("All of them");
  });

  describe("references", () => {
    const author = (name: string, id: string, targetCollection?: string): Record<string, unknown> => ({
      nonRefProps: { fields: { name: { textValue: name } } },
      metadata: { id },
      targetCollection,
    });

    it("decodes requested references and skips the rest", () => {
      const out = objects(
        {
          results: [
            {
              properties: {
                nonRefProps: { fields: { title: { textValue: "Rivers" } } },
                refProps: [
                  { propName: "author", properties: [author("Ann", "p-1", "Person")] },
                  { propName: "reviewer", properties: [author("Bob", "p-2", "Person")] },
                ],
              },
              metadata: { id: "obj-1" },
            },
          ],
        },
        { returnReferences: [{ linkOn: "author" }] }
      );

      expect(out.objects[0].references).toEqual({
        author: {
          objects: [
            {
              uuid: "p-1",
              collection: "Person",
              properties: { name: "Ann" },
              metadata: {},
              references: {},
              vectors: {},
            },
          ],
        },
      });
    });

    it("merges entries for the same reference property", () => {
      const out = objects(
        {
          results: [
            {
              properties: {
                refProps: [
                  { propName: "author", properties: [author("Ann", "p-1", "Person")] },
                  { propName: "author", properties: [author("Acme", "o-1")] },
                ],
              },
            },
          ],
        },
        { returnReferences: [{ linkOn: "author", targetCollection: "Organization" }] }
      );

      const linked = out.objects[0].references.author.objects;
      expect(linked.map((o) => o.uuid)).toEqual(["p-1", "o-1"]);
      expect(linked.map((o) => o.collection)).toEqual(["Person", "Organization"]);
    });

    it("returns no references when none were asked for", () => {
      const out = objects({
        results: [{ properties: { refProps: [{ propName: "author", properties: [author("Ann", "p-1")] }] } }],
      });

      expect(out.objects[0].references).toEqual({});
    });
  });

  describe("groups", () => {
    const raw = {
      groupByResults: [
        {
          name: "news",
          minDistance: 0.1,
          maxDistance: 0.2,
          numberOfObjects: 2,
          objects: [result({}, { id: "obj-1" }), result({}, { id: "obj-2" })],
          rerank: { score: 0.9 },
          generative: { result: "News digest" },
        },
        { name: "sport", objects: [result({}, { id: "obj-3" })] },
      ],
    };
    const groupBy = { property: "category", numberOfGroups: 2, objectsPerGroup: 1 };

    it("truncates each group and tags its members", () => {
      const out = groups(raw, { groupBy });

      expect(Object.keys(out.groups)).toEqual(["news", "sport"]);
      expect(out.groups.news).toMatchObject({
        name: "news",
        minDistance: 0.1,
        maxDistance: 0.2,
        numberOfObjects: 2,
        rerankScore: 0.9,
        generated: "News digest",
      });
      expect(out.groups.news.objects.map((o) => [o.uuid, o.belongsToGroup])).toEqual([["obj-1", "news"]]);
      expect(out.groups.sport.rerankScore).toBeUndefined();
      expect(out.objects.map((o) => o.uuid)).toEqual(["obj-1", "obj-3"]);
    });

    it("keeps group names that collide with object builtins", () => {
      const out = groups(
        {
          groupByResults: [
            { name: "__proto__", objects: [result({ title: { textValue: "Odd" } }, { id: "obj-1" })] },
            { name: "news", objects: [result({ title: { textValue: "Rivers" } }, { id: "obj-2" })] },
          ],
        },
        { groupBy }
      );

      expect(Object.keys(out.groups)).toEqual(["__proto__", "news"]);
      expect(Object.getPrototypeOf(out.groups)).toBe(Object.prototype);
      expect(out.groups["__proto__"].objects.map((o) => o.uuid)).toEqual(["obj-1"]);

      const projected = projectGroupByReturn(out, returnShape(z.object({ title: z.string() })));
      expect(Object.keys(projected.groups)).toEqual(["__proto__", "news"]);
      expect(projected.objects.map((o) => o.properties.title)).toEqual(["Odd", "Rivers"]);
    });
  });

  it("returns frozen results and decodes the same reply the same way twice", () => {
    const source = reply({ results: [result({ title: { textValue: "Rivers" } }, { id: "obj-1" })] });

    const first = decodeQueryReply(source, { collection: "Article" });
    const second = decodeQueryReply(source, { collection: "Article" });

    expect(second).toEqual(first);
    expect(Object.isFrozen(first.result.objects)).toBe(true);
    expect(Object.isFrozen(first.result.objects[0])).toBe(true);
    expect(Object.isFrozen(first.result.objects[0].properties)).toBe(true);
  });
});
