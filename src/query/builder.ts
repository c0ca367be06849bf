/**
 * Assembles wire `SearchRequest`s from typed query parameters.
 *
 * Every optional the caller leaves out stays absent on the wire. Contract
 * violations are raised as {@link InvalidArgumentError} before anything is sent.
 */

import { Buffer } from "node:buffer";

import { InvalidArgumentError } from "../errors";
import { packFloat32 } from "../proto/packing";
import {
  ConsistencyLevel as WireConsistency,
  FusionType,
  SEARCH_MODE_FIELDS,
  type GenerativeSearch,
  type MetadataRequest,
  type NearTextMove,
  type ObjectPropertiesRequest,
  type PropertiesRequest,
  type RefPropertiesRequest,
  type SearchRequest,
  type SortBy,
} from "../proto/schema";
import type {
  ConsistencyLevel,
  GenerateOptions,
  HybridFusion,
  IncludeVector,
  Media,
  MetadataName,
  MetadataQuery,
  Move,
  QueryNested,
  QueryReference,
  ReturnMetadata,
  ReturnProperty,
  SearchMode,
  SearchOptions,
  Sort,
  TargetVector,
} from "../types";
import { METADATA_NAMES } from "../types";
import { toWireFilters } from "./filters";

export interface BuildOptions extends SearchOptions {
  tenant?: string;
  consistencyLevel?: ConsistencyLevel;
}

/** Hybrid weighting sent when the caller gives none; 0 would mean keyword-only. */
export const DEFAULT_HYBRID_ALPHA = 0.7;

const CONSISTENCY_LEVELS: Record<ConsistencyLevel, WireConsistency> = {
  ONE: WireConsistency.CONSISTENCY_LEVEL_ONE,
  QUORUM: WireConsistency.CONSISTENCY_LEVEL_QUORUM,
  ALL: WireConsistency.CONSISTENCY_LEVEL_ALL,
};

const FUSION_TYPES: Record<HybridFusion, FusionType> = {
  ranked: FusionType.FUSION_TYPE_RANKED,
  relativeScore: FusionType.FUSION_TYPE_RELATIVE_SCORE,
};

/** Metadata attribute to its `MetadataRequest` flag. */
const METADATA_FLAGS = {
  creationTime: "creationTimeUnix",
  lastUpdateTime: "lastUpdateTimeUnix",
  distance: "distance",
  certainty: "certainty",
  score: "score",
  explainScore: "explainScore",
  isConsistent: "isConsistent",
} as const satisfies Record<MetadataName, keyof MetadataRequest>;

// =============================================================================
// Entry point
// =============================================================================

export function buildSearchRequest(collection: string, mode: SearchMode, options: BuildOptions = {}): SearchRequest {
  if (!collection) {
    throw new InvalidArgumentError("A collection name is required");
  }
  const targetVectors = parseTargetVectors(options.targetVector);

  const request: SearchRequest = {
    collection,
    ...searchMode(mode, targetVectors),
  };

  if (options.tenant) request.tenant = options.tenant;
  if (options.consistencyLevel !== undefined) {
    const level = CONSISTENCY_LEVELS[options.consistencyLevel];
    if (level === undefined) {
      throw new InvalidArgumentError(`Unknown consistency level '${String(options.consistencyLevel)}'`);
    }
    request.consistencyLevel = level;
  }

  request.properties = buildPropertiesRequest(options.returnProperties, options.returnReferences);
  const metadata = buildMetadataRequest(options.returnMetadata, options.includeVector);
  if (metadata) request.metadata = metadata;

  if (options.limit !== undefined) request.limit = count("limit", options.limit);
  if (options.offset !== undefined) request.offset = count("offset", options.offset);
  if (options.autoLimit !== undefined) request.autocut = count("autoLimit", options.autoLimit);
  if (options.after !== undefined) request.after = options.after;

  if (options.filters) request.filters = toWireFilters(options.filters);
  if (options.sort) request.sortBy = buildSort(options.sort);
  if (options.groupBy) {
    const { property, numberOfGroups, objectsPerGroup } = options.groupBy;
    if (!property) throw new InvalidArgumentError("groupBy.property is required");
    request.groupBy = {
      path: [property],
      numberOfGroups: positive("groupBy.numberOfGroups", numberOfGroups),
      objectsPerGroup: positive("groupBy.objectsPerGroup", objectsPerGroup),
    };
  }
  if (options.rerank) {
    if (!options.rerank.property) throw new InvalidArgumentError("rerank.property is required");
    request.rerank = { property: options.rerank.property };
    if (options.rerank.query !== undefined) request.rerank.query = options.rerank.query;
  }
  if (options.generate) request.generative = buildGenerative(options.generate);

  assertSingleMode(request);
  return request;
}

/** A request may carry at most one search-mode sub-message. */
export function assertSingleMode(request: SearchRequest): void {
  const set = SEARCH_MODE_FIELDS.filter((field) => request[field] !== undefined);
  if (set.length > 1) {
    throw new InvalidArgumentError(`Conflicting search modes: ${set.join(", ")}`);
  }
}

// =============================================================================
// Search modes
// =============================================================================

type ModeFields = Pick<SearchRequest, (typeof SEARCH_MODE_FIELDS)[number]>;

function bounds(mode: { certainty?: number; distance?: number }): { certainty?: number; distance?: number } {
  const out: { certainty?: number; distance?: number } = {};
  if (mode.certainty !== undefined) out.certainty = finite("certainty", mode.certainty);
  if (mode.distance !== undefined) out.distance = finite("distance", mode.distance);
  return out;
}

function withTargets<T extends object>(
  message: T,
  targetVectors: string[] | undefined
): T | (T & { targetVectors: string[] }) {
  return targetVectors ? { ...message, targetVectors } : message;
}

function searchMode(mode: SearchMode, targetVectors: string[] | undefined): ModeFields {
  if (!mode || typeof mode !== "object") {
    throw new InvalidArgumentError("A search mode is required");
  }
  switch (mode.kind) {
    case "nearVector":
      return { nearVector: withTargets({ vectorBytes: vectorBytes(mode.vector), ...bounds(mode) }, targetVectors) };
    case "nearObject":
      if (!mode.id) throw new InvalidArgumentError("nearObject needs an object id");
      return { nearObject: withTargets({ id: mode.id, ...bounds(mode) }, targetVectors) };
    case "nearText": {
      const query = toList(mode.query);
      if (query.length === 0) throw new InvalidArgumentError("nearText needs at least one concept");
      const nearText = withTargets({ query, ...bounds(mode) }, targetVectors);
      return {
        nearText: {
          ...nearText,
          ...(mode.moveTo ? { moveTo: buildMove("moveTo", mode.moveTo) } : {}),
          ...(mode.moveAway ? { moveAway: buildMove("moveAway", mode.moveAway) } : {}),
        },
      };
    }
    case "nearMedia":
      return nearMedia(mode, targetVectors);
    case "bm25":
      if (targetVectors) throw new InvalidArgumentError("targetVector is not supported by bm25");
      return {
        bm25Search: {
          query: mode.query,
          ...(mode.queryProperties ? { properties: [...mode.queryProperties] } : {}),
        },
      };
    case "hybrid": {
      const alpha = mode.alpha ?? DEFAULT_HYBRID_ALPHA;
      if (!(alpha >= 0 && alpha <= 1)) {
        throw new InvalidArgumentError(`hybrid alpha must be within [0, 1], got ${alpha}`);
      }
      let fusionType: FusionType | undefined;
      if (mode.fusionType !== undefined) {
        fusionType = FUSION_TYPES[mode.fusionType];
        if (fusionType === undefined) {
          throw new InvalidArgumentError(`Unknown fusion type '${String(mode.fusionType)}'`);
        }
      }
      return {
        hybridSearch: withTargets(
          {
            query: mode.query,
            alpha,
            ...(mode.queryProperties ? { properties: [...mode.queryProperties] } : {}),
            ...(fusionType !== undefined ? { fusionType } : {}),
            ...(mode.vector ? { vectorBytes: vectorBytes(mode.vector) } : {}),
          },
          targetVectors
        ),
      };
    }
    case "fetch":
      if (targetVectors) throw new InvalidArgumentError("targetVector needs a vector search mode");
      return {};
    default: {
      const unknown: never = mode;
      throw new InvalidArgumentError(`Unknown search mode ${JSON.stringify(unknown)}`);
    }
  }
}

function nearMedia(mode: Extract<SearchMode, { kind: "nearMedia" }>, targetVectors: string[] | undefined): ModeFields {
  const media = encodeMedia(mode.media);
  const common = withTargets(bounds(mode), targetVectors);
  switch (mode.mediaType) {
    case "image":
      return { nearImage: { image: media, ...common } };
    case "audio":
      return { nearAudio: { audio: media, ...common } };
    case "video":
      return { nearVideo: { video: media, ...common } };
    case "depth":
      return { nearDepth: { depth: media, ...common } };
    case "thermal":
      return { nearThermal: { thermal: media, ...common } };
    case "imu":
      return { nearImu: { imu: media, ...common } };
    default:
      throw new InvalidArgumentError(`Unknown media type '${String(mode.mediaType)}'`);
  }
}

function encodeMedia(media: Media): string {
  const encoded = typeof media === "string" ? media : Buffer.from(media).toString("base64");
  if (!encoded) throw new InvalidArgumentError("nearMedia needs non-empty media");
  return encoded;
}

function vectorBytes(vector: readonly number[]): Uint8Array {
  if (vector.length === 0) throw new InvalidArgumentError("Vector must not be empty");
  if (!vector.every((v) => Number.isFinite(v))) {
    throw new InvalidArgumentError("Vector components must be finite numbers");
  }
  return packFloat32(vector);
}

function buildMove(name: string, move: Move): NearTextMove {
  const concepts = move.concepts === undefined ? [] : toList(move.concepts);
  const uuids = move.objects === undefined ? [] : toList(move.objects);
  if (concepts.length === 0 && uuids.length === 0) {
    throw new InvalidArgumentError(`${name} needs concepts or objects`);
  }
  return {
    force: finite(`${name}.force`, move.force),
    ...(concepts.length ? { concepts } : {}),
    ...(uuids.length ? { uuids } : {}),
  };
}

function parseTargetVectors(target: TargetVector | undefined): string[] | undefined {
  if (target === undefined) return undefined;
  const names = toList(target);
  if (names.length === 0) throw new InvalidArgumentError("targetVector must name at least one vector");
  return uniqueNames("targetVector", names);
}

// =============================================================================
// Return selection
// =============================================================================

function isNameList(value: ReturnMetadata): value is readonly MetadataName[] {
  return Array.isArray(value);
}

function metadataNames(returnMetadata: ReturnMetadata): readonly MetadataName[] {
  if (isNameList(returnMetadata)) return returnMetadata;
  const query: MetadataQuery = returnMetadata;
  return METADATA_NAMES.filter((name) => query[name] === true);
}

/** `undefined` when neither metadata nor vectors were asked for. */
export function buildMetadataRequest(
  returnMetadata: ReturnMetadata | undefined,
  includeVector: IncludeVector | undefined
): MetadataRequest | undefined {
  if (returnMetadata === undefined && !includeVector) return undefined;

  const request: MetadataRequest = { uuid: true };
  const names = returnMetadata === undefined ? [] : metadataNames(returnMetadata);
  for (const name of names) {
    const flag = METADATA_FLAGS[name];
    if (flag === undefined) throw new InvalidArgumentError(`Unknown metadata attribute '${String(name)}'`);
    request[flag] = true;
  }

  if (includeVector === true) {
    request.vector = true;
  } else if (includeVector) {
    const vectors = toList(includeVector);
    if (vectors.length) request.vectors = uniqueNames("includeVector", vectors);
  }
  return request;
}

export function buildPropertiesRequest(
  returnProperties: readonly ReturnProperty[] | undefined,
  returnReferences: readonly QueryReference[] | undefined
): PropertiesRequest {
  const request: PropertiesRequest = {};
  if (returnProperties === undefined) {
    request.returnAllNonrefProperties = true;
  } else {
    const { names, nested } = splitProperties(returnProperties);
    if (names.length) request.nonRefProperties = names;
    if (nested.length) request.objectProperties = nested.map(buildNested);
  }
  if (returnReferences?.length) {
    request.refProperties = returnReferences.map(buildReference);
  }
  return request;
}

function splitProperties(properties: readonly ReturnProperty[]): { names: string[]; nested: QueryNested[] } {
  const names: string[] = [];
  const nested: QueryNested[] = [];
  for (const property of properties) {
    if (typeof property === "string") {
      if (!property) throw new InvalidArgumentError("Property names must not be empty");
      names.push(property);
    } else {
      nested.push(property);
    }
  }
  return { names, nested };
}

function buildNested(nested: QueryNested): ObjectPropertiesRequest {
  if (!nested.name) throw new InvalidArgumentError("Nested property selection needs a name");
  const { names, nested: children } = splitProperties(toList(nested.properties));
  return {
    propName: nested.name,
    ...(names.length ? { primitiveProperties: names } : {}),
    ...(children.length ? { objectProperties: children.map(buildNested) } : {}),
  };
}

function buildReference(reference: QueryReference): RefPropertiesRequest {
  if (!reference.linkOn) throw new InvalidArgumentError("Reference selection needs linkOn");
  return {
    referenceProperty: reference.linkOn,
    properties: buildPropertiesRequest(reference.returnProperties, reference.returnReferences),
    // Referenced objects are always identified, even when no metadata was asked for.
    metadata: buildMetadataRequest(reference.returnMetadata, reference.includeVector) ?? { uuid: true },
    ...(reference.targetCollection ? { targetCollection: reference.targetCollection } : {}),
  };
}

// =============================================================================
// Ordering and generation
// =============================================================================

function isSortList(sort: Sort | readonly Sort[]): sort is readonly Sort[] {
  return Array.isArray(sort);
}

function buildSort(sort: Sort | readonly Sort[]): SortBy[] {
  const list = isSortList(sort) ? sort : [sort];
  return list.map(({ property, ascending }) => {
    if (!property) throw new InvalidArgumentError("Sort needs a property");
    return ascending ? { ascending: true, path: [property] } : { path: [property] };
  });
}

function buildGenerative(generate: GenerateOptions): GenerativeSearch {
  if (!generate.singlePrompt && !generate.groupedTask) {
    throw new InvalidArgumentError("generate needs singlePrompt or groupedTask");
  }
  const generative: GenerativeSearch = {};
  if (generate.singlePrompt) generative.singleResponsePrompt = generate.singlePrompt;
  if (generate.groupedTask) generative.groupedResponseTask = generate.groupedTask;
  if (generate.groupedProperties?.length) generative.groupedProperties = [...generate.groupedProperties];
  return generative;
}

// =============================================================================
// Helpers
// =============================================================================

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

function toList<T>(value: T | readonly T[]): T[] {
  return isList(value) ? [...value] : [value];
}

function uniqueNames(option: string, names: string[]): string[] {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) throw new InvalidArgumentError(`Duplicate vector name '${name}' in ${option}`);
    seen.add(name);
  }
  return names;
}

const UINT32_MAX = 0xffffffff;
const INT32_MAX = 0x7fffffff;

/** Non-negative count carried in a uint32 field. */
function count(option: string, value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${option} must be a non-negative integer, got ${value}`);
  }
  if (value > UINT32_MAX) throw new InvalidArgumentError(`${option} must be at most ${UINT32_MAX}, got ${value}`);
  return value;
}

/** Positive count carried in an int32 field. */
function positive(option: string, value: number): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new InvalidArgumentError(`${option} must be a positive integer, got ${value}`);
  }
  if (value > INT32_MAX) throw new InvalidArgumentError(`${option} must be at most ${INT32_MAX}, got ${value}`);
  return value;
}

function finite(option: string, value: number): number {
  if (!Number.isFinite(value)) throw new InvalidArgumentError(`${option} must be a finite number`);
  return value;
}
