/**
 * End-to-end tests of the query client over an in-process transport.
 */

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { z } from "zod";

import { QueryClient } from "../src/client";
import { ConnectionError, InvalidArgumentError, QueryError, TypeMismatchError } from "../src/errors";
import { getLogger } from "../src/logger";
import { Filter } from "../src/query/filters";
import { returnShape } from "../src/result/projection";
import { FakeTransport } from "./helpers/fake-transport";

function textResult(id: string, fields: Record<string, string>): Record<string, unknown> {
  const typed = Object.fromEntries(Object.entries(fields).map(([name, value]) => [name, { textValue: value }]));
  return { properties: { nonRefProps: { fields: typed } }, metadata: { id } };
}

describe("QueryClient", () => {
  let transport: FakeTransport;
  let client: QueryClient;

  beforeEach(() => {
    transport = new FakeTransport();
    client = new QueryClient({ logLevel: "SILENT" }, transport);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("leaves the logger level alone unless one is configured", () => {
    const setLevel = vi.spyOn(getLogger(), "setLogLevel");

    new QueryClient({}, transport);
    expect(setLevel).not.toHaveBeenCalled();

    new QueryClient({ logLevel: "ERROR" }, transport);
    expect(setLevel).toHaveBeenCalledWith("ERROR");
  });

  it("runs a vector search and returns results in server order", async () => {
    transport.respondWith({
      results: [
        { properties: {}, metadata: { id: "obj-1", distance: 0.12, distancePresent: true } },
        { properties: {}, metadata: { id: "obj-2", distance: 0.34, distancePresent: true } },
      ],
    });

    const result = await client
      .collection("Article")
      .nearVector([0.1, 0.2, 0.3], { limit: 10, returnMetadata: ["distance"] });

    expect(transport.lastRequest).toMatchObject({
      collection: "Article",
      limit: 10,
      metadata: { uuid: true, distance: true },
      properties: { returnAllNonrefProperties: true },
      nearVector: { vectorBytes: expect.any(Uint8Array) },
    });
    expect(result.objects.map((o) => o.uuid)).toEqual(["obj-1", "obj-2"]);
    expect(result.objects[0].collection).toBe("Article");
    expect(result.objects[0].metadata.distance).toBeCloseTo(0.12, 6);
    expect(result.objects[1].metadata.distance).toBeCloseTo(0.34, 6);
  });

  it("passes call options to the transport", async () => {
    await client.collection("Article").bm25("rivers", { timeoutMs: 500 });

    expect(transport.calls).toEqual([{ timeoutMs: 500 }]);
    expect(transport.lastRequest).toMatchObject({ bm25Search: { query: "rivers" } });
  });

  it("scopes handles without changing the original", async () => {
    const articles = client.collection("Article");
    const scoped = articles.withTenant("tenant-a").withConsistency("ALL");

    await scoped.fetchObjects();
    await articles.fetchObjects();

    expect(scoped.tenant).toBe("tenant-a");
    expect(articles.tenant).toBeUndefined();
    expect(transport.requests[0]).toMatchObject({ tenant: "tenant-a", consistencyLevel: 3 });
    expect(transport.requests[1].tenant).toBeUndefined();
    expect(transport.requests[1].consistencyLevel).toBeUndefined();
  });

  it("returns groups when grouping", async () => {
    transport.respondWith({
      groupByResults: [
        { name: "news", numberOfObjects: 1, objects: [textResult("obj-1", { title: "Rivers" })] },
        { name: "sport", numberOfObjects: 1, objects: [textResult("obj-2", { title: "Lakes" })] },
      ],
    });

    const result = await client.collection("Article").hybrid("water", {
      groupBy: { property: "category", numberOfGroups: 2, objectsPerGroup: 3 },
    });

    expect(transport.lastRequest).toMatchObject({
      groupBy: { path: ["category"], numberOfGroups: 2, objectsPerGroup: 3 },
      hybridSearch: { query: "water" },
    });
    expect(Object.keys(result.groups)).toEqual(["news", "sport"]);
    expect(result.objects.map((o) => o.belongsToGroup)).toEqual(["news", "sport"]);
    expect(result.groups.news.objects[0].properties).toEqual({ title: "Rivers" });
  });

  describe("fetchObjectById", () => {
    it("filters on the id and limits to one object", async () => {
      transport.respondWith({ results: [textResult("obj-1", { title: "Rivers" })] });

      const found = await client.collection("Article").fetchObjectById("obj-1");

      expect(transport.lastRequest).toMatchObject({
        limit: 1,
        filters: { operator: 1, on: ["_id"], valueText: "obj-1" },
      });
      expect(found?.uuid).toBe("obj-1");
      expect(found?.properties).toEqual({ title: "Rivers" });
    });

    it("returns null when nothing matches", async () => {
      expect(await client.collection("Article").fetchObjectById("missing")).toBeNull();
    });
  });

  describe("withReturnType", () => {
    const Article = z.object({ title: z.string() });

    it("requests the shape's properties and parses results into it", async () => {
      transport.respondWith({ results: [textResult("obj-1", { title: "Rivers" })] });
      const articles = client.collection("Article").withReturnType(returnShape(Article));

      const result = await articles.nearText("water", { filters: Filter.byProperty("title").like("Riv*") });

      expect(transport.lastRequest).toMatchObject({
        properties: { nonRefProperties: ["title"] },
        nearText: { query: ["water"] },
      });
      const title: string = result.objects[0].properties.title;
      expect(title).toBe("Rivers");
    });

    it("rejects results that do not fit", async () => {
      transport.respondWith({ results: [textResult("obj-1", { name: "Rivers" })] });
      const articles = client.collection("Article").withReturnType(returnShape(Article));

      await expect(articles.fetchObjects()).rejects.toBeInstanceOf(TypeMismatchError);
    });
  });

  it("surfaces transport failures unchanged", async () => {
    transport.failWith(new QueryError("Query rejected: INVALID_ARGUMENT: no such class", 3));

    await expect(client.collection("Article").fetchObjects()).rejects.toThrow(
      "Query rejected: INVALID_ARGUMENT: no such class"
    );
  });

  it("wraps plain errors thrown by an injected transport", async () => {
    transport.failWith(new Error("socket hang up"));

    const failure = client.collection("Article").fetchObjects();

    await expect(failure).rejects.toBeInstanceOf(ConnectionError);
    await expect(failure).rejects.toThrow("Search call failed: socket hang up");
  });

  it("validates requests before sending", async () => {
    await expect(client.collection("Article").fetchObjects({ limit: -1 })).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
    expect(transport.requests).toHaveLength(0);
  });

  it("connects and closes the transport", () => {
    client.connect();
    expect(transport.connected).toBe(true);
    client.close();
    expect(transport.connected).toBe(false);
  });

  it("requires a collection name and a workflow service", () => {
    expect(() => client.collection("")).toThrow(InvalidArgumentError);
    expect(() => client.workflows("Article")).toThrow(InvalidArgumentError);
  });
});
