/**
 * Reconstructs result objects from a validated {@link SearchReply}.
 *
 * The decoder is told what was requested. Metadata is exposed only where the
 * server set the matching presence flag, references only where the caller
 * asked for them, and vectors only when they were included.
 */

import { getLogger } from "../logger";
import { unpackFloat32, uuidFromBytes } from "../proto/packing";
import type { MetadataResult, PropertiesResult, SearchReply, SearchResult } from "../proto/schema";
import type {
  Group,
  GroupBy,
  GroupByObject,
  GroupByReturn,
  IncludeVector,
  ObjectMetadata,
  QueryReference,
  QueryReturn,
  ReferencedObject,
  References,
  ResultObject,
  ReturnProperty,
} from "../types";
import { getOwn, setOwn } from "./records";
import { decodeResultProperties, type BlobPolicy } from "./values";

export interface DecodeOptions {
  /** Collection the query ran against. */
  collection: string;
  includeVector?: IncludeVector;
  returnProperties?: readonly ReturnProperty[];
  returnReferences?: readonly QueryReference[];
  groupBy?: GroupBy;
}

export type DecodedReply =
  | { kind: "objects"; result: QueryReturn }
  | { kind: "groups"; result: GroupByReturn };

interface Selection {
  collection: string;
  includeVector: boolean;
  keepBlob: BlobPolicy;
  references: readonly QueryReference[];
}

const DEFAULT_VECTOR = "default";

export function decodeQueryReply(reply: SearchReply, options: DecodeOptions): DecodedReply {
  const dropped = new Set<string>();
  const selection: Selection = {
    collection: options.collection,
    includeVector: Boolean(options.includeVector),
    keepBlob: blobPolicy(options.returnProperties, dropped),
    references: options.returnReferences ?? [],
  };

  const decoded: DecodedReply = options.groupBy
    ? { kind: "groups", result: decodeGroups(reply, selection, options.groupBy) }
    : { kind: "objects", result: decodeObjects(reply, selection) };

  if (dropped.size) {
    getLogger().warn("Dropped blob properties that were not requested", { properties: [...dropped] });
  }
  return decoded;
}

/**
 * Without an explicit selection blobs are never returned; with one, only the
 * blobs it names are.
 */
function blobPolicy(returnProperties: readonly ReturnProperty[] | undefined, dropped?: Set<string>): BlobPolicy {
  const named = new Set(returnProperties?.filter((p): p is string => typeof p === "string"));
  return (name) => {
    if (named.has(name)) return true;
    dropped?.add(name);
    return false;
  };
}

// =============================================================================
// Replies
// =============================================================================

function decodeObjects(reply: SearchReply, selection: Selection): QueryReturn {
  const result: QueryReturn = {
    objects: Object.freeze(reply.results.map((r) => decodeSearchResult(r, selection))),
  };
  if (reply.generativeGroupedResult !== undefined) result.generated = reply.generativeGroupedResult;
  return Object.freeze(result);
}

function decodeGroups(reply: SearchReply, selection: Selection, groupBy: GroupBy): GroupByReturn {
  const groups: Record<string, Group> = {};
  const objects: GroupByObject[] = [];

  for (const g of reply.groupByResults) {
    const members = g.objects.slice(0, groupBy.objectsPerGroup).map(
      (r): GroupByObject => Object.freeze({ ...decodeSearchResult(r, selection), belongsToGroup: g.name })
    );
    const group: Group = {
      name: g.name,
      minDistance: g.minDistance,
      maxDistance: g.maxDistance,
      numberOfObjects: g.numberOfObjects,
      objects: Object.freeze(members),
    };
    if (g.rerank) group.rerankScore = g.rerank.score;
    if (g.generative) group.generated = g.generative.result;
    setOwn(groups, g.name, Object.freeze(group));
    objects.push(...members);
  }

  const result: GroupByReturn = {
    objects: Object.freeze(objects),
    groups: Object.freeze(groups),
  };
  if (reply.generativeGroupedResult !== undefined) result.generated = reply.generativeGroupedResult;
  return Object.freeze(result);
}

// =============================================================================
// Objects
// =============================================================================

function decodeSearchResult(result: SearchResult, selection: Selection): ResultObject {
  return decodeObject(result.properties, result.metadata, selection);
}

function decodeObject(
  properties: PropertiesResult,
  metadata: MetadataResult | undefined,
  selection: Selection
): ResultObject {
  const object: ResultObject = {
    collection: selection.collection,
    properties: Object.freeze(decodeResultProperties(properties, selection.keepBlob)),
    metadata: Object.freeze(metadata ? decodeMetadata(metadata) : {}),
    references: Object.freeze(decodeReferences(properties, selection)),
    vectors: Object.freeze(metadata && selection.includeVector ? decodeVectors(metadata) : {}),
  };
  const uuid = metadata ? objectId(metadata) : undefined;
  if (uuid !== undefined) object.uuid = uuid;
  if (metadata?.generativePresent) object.generated = metadata.generative ?? "";
  return Object.freeze(object);
}

function objectId(metadata: MetadataResult): string | undefined {
  if (metadata.id) return metadata.id;
  return metadata.idAsBytes ? uuidFromBytes(metadata.idAsBytes) : undefined;
}

/** Proto3 leaves zero values off the wire, so a present flag without a value means zero. */
export function decodeMetadata(m: MetadataResult): ObjectMetadata {
  const out: ObjectMetadata = {};
  if (m.creationTimeUnixPresent) out.creationTime = new Date(m.creationTimeUnix ?? 0);
  if (m.lastUpdateTimeUnixPresent) out.lastUpdateTime = new Date(m.lastUpdateTimeUnix ?? 0);
  if (m.distancePresent) out.distance = m.distance ?? 0;
  if (m.certaintyPresent) out.certainty = m.certainty ?? 0;
  if (m.scorePresent) out.score = m.score ?? 0;
  if (m.explainScorePresent) out.explainScore = m.explainScore ?? "";
  if (m.isConsistentPresent) out.isConsistent = m.isConsistent ?? false;
  if (m.rerankScorePresent) out.rerankScore = m.rerankScore ?? 0;
  return out;
}

function decodeVectors(m: MetadataResult): Record<string, readonly number[]> {
  const vectors: Record<string, readonly number[]> = {};
  for (const named of m.vectors) {
    const values = named.vectorBytes ? unpackFloat32(named.vectorBytes) : [];
    setOwn(vectors, named.name || DEFAULT_VECTOR, Object.freeze(values));
  }
  if (getOwn(vectors, DEFAULT_VECTOR) === undefined) {
    if (m.vectorBytes && m.vectorBytes.byteLength > 0) {
      vectors[DEFAULT_VECTOR] = Object.freeze(unpackFloat32(m.vectorBytes));
    } else if (m.vector.length > 0) {
      vectors[DEFAULT_VECTOR] = Object.freeze([...m.vector]);
    }
  }
  return vectors;
}

// =============================================================================
// References
// =============================================================================

function decodeReferences(properties: PropertiesResult, selection: Selection): References {
  const references: References = {};
  if (selection.references.length === 0) return references;

  for (const entry of properties.refProps) {
    const candidates = selection.references.filter((r) => r.linkOn === entry.propName);
    if (candidates.length === 0) continue;

    const objects = entry.properties.map((target) => {
      const query = candidates.find((r) => r.targetCollection === target.targetCollection) ?? candidates[0];
      return decodeReferencedObject(target, query);
    });
    const existing = getOwn(references, entry.propName);
    setOwn(
      references,
      entry.propName,
      Object.freeze({ objects: Object.freeze(existing ? [...existing.objects, ...objects] : objects) })
    );
  }
  return references;
}

function decodeReferencedObject(target: PropertiesResult, query: QueryReference): ReferencedObject {
  return decodeObject(target, target.metadata, {
    collection: target.targetCollection || query.targetCollection || "",
    includeVector: Boolean(query.includeVector),
    keepBlob: blobPolicy(query.returnProperties),
    references: query.returnReferences ?? [],
  });
}
