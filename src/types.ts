// =============================================================================
// Property values
// =============================================================================

export interface GeoCoordinate {
  latitude: number;
  longitude: number;
}

export interface PhoneNumber {
  /** The number as it was entered. */
  number: string;
  countryCode?: number;
  defaultCountry?: string;
  internationalFormatted?: string;
  national?: number;
  nationalFormatted?: string;
  valid?: boolean;
}

/** Blob properties arrive as base64 strings. Dates are decoded to `Date`. */
export type PropertyValue =
  | null
  | string
  | number
  | boolean
  | Date
  | GeoCoordinate
  | PhoneNumber
  | Properties
  | PropertyValue[];

/** Generic property bag: property name to decoded value. */
export interface Properties {
  [name: string]: PropertyValue;
}

// =============================================================================
// What to return
// =============================================================================

export const METADATA_NAMES = [
  "creationTime",
  "lastUpdateTime",
  "distance",
  "certainty",
  "score",
  "explainScore",
  "isConsistent",
] as const;

export type MetadataName = (typeof METADATA_NAMES)[number];

export type MetadataQuery = { [K in MetadataName]?: boolean };

/** Either a flag object or the list of names to return. */
export type ReturnMetadata = MetadataQuery | readonly MetadataName[];

/** Every metadata attribute the server can return. */
export function allMetadata(): MetadataQuery {
  return {
    creationTime: true,
    lastUpdateTime: true,
    distance: true,
    certainty: true,
    score: true,
    explainScore: true,
    isConsistent: true,
  };
}

/** `true` for the default vector, or the names of the vectors to return. */
export type IncludeVector = boolean | string | readonly string[];

/** Selection of sub-properties inside an object or object-array property. */
export interface QueryNested {
  name: string;
  properties: ReturnProperty | readonly ReturnProperty[];
}

export type ReturnProperty = string | QueryNested;

export interface QueryReference {
  /** Name of the reference property. */
  linkOn: string;
  /** Collection to follow for multi-target references. */
  targetCollection?: string;
  returnProperties?: readonly ReturnProperty[];
  returnMetadata?: ReturnMetadata;
  includeVector?: IncludeVector;
  returnReferences?: readonly QueryReference[];
}

// =============================================================================
// Query parameters
// =============================================================================

export type ConsistencyLevel = "ONE" | "QUORUM" | "ALL";

export type HybridFusion = "ranked" | "relativeScore";

export type TargetVector = string | readonly string[];

export type NearMediaType = "image" | "audio" | "video" | "depth" | "thermal" | "imu";

/** Raw bytes, or a base64 string. */
export type Media = string | Uint8Array;

export interface Move {
  force: number;
  concepts?: string | readonly string[];
  objects?: string | readonly string[];
}

export interface GroupBy {
  property: string;
  numberOfGroups: number;
  objectsPerGroup: number;
}

export interface Rerank {
  property: string;
  query?: string;
}

export interface Sort {
  property: string;
  ascending?: boolean;
}

export interface GenerateOptions {
  /** Prompt run once per object; `{property}` placeholders are filled server-side. */
  singlePrompt?: string;
  /** Task run once over the whole result set. */
  groupedTask?: string;
  groupedProperties?: readonly string[];
}

interface SimilarityBounds {
  certainty?: number;
  distance?: number;
}

/** The retrieval mode of a query. Exactly one is sent per request. */
export type SearchMode =
  | ({ kind: "nearVector"; vector: readonly number[] } & SimilarityBounds)
  | ({ kind: "nearObject"; id: string } & SimilarityBounds)
  | ({
      kind: "nearText";
      query: string | readonly string[];
      moveTo?: Move;
      moveAway?: Move;
    } & SimilarityBounds)
  | ({ kind: "nearMedia"; media: Media; mediaType: NearMediaType } & SimilarityBounds)
  | { kind: "bm25"; query: string; queryProperties?: readonly string[] }
  | {
      kind: "hybrid";
      query: string;
      /** 0 is pure keyword search, 1 pure vector search. */
      alpha?: number;
      vector?: readonly number[];
      queryProperties?: readonly string[];
      fusionType?: HybridFusion;
    }
  | { kind: "fetch" };

export type SearchModeKind = SearchMode["kind"];

// =============================================================================
// Filters
// =============================================================================

export type FilterOperator =
  | "Equal"
  | "NotEqual"
  | "LessThan"
  | "LessThanEqual"
  | "GreaterThan"
  | "GreaterThanEqual"
  | "Like"
  | "IsNull"
  | "ContainsAny"
  | "ContainsAll"
  | "WithinGeoRange";

export interface GeoRange extends GeoCoordinate {
  /** Radius in meters. */
  distance: number;
}

export type FilterScalar = string | number | boolean | Date;

export type FilterValue =
  | FilterScalar
  | readonly string[]
  | readonly number[]
  | readonly boolean[]
  | readonly Date[]
  | GeoRange;

export interface FilterLeaf {
  operator: FilterOperator;
  /** Property path; reference hops alternate link name and target collection. */
  target: readonly string[];
  value: FilterValue;
}

export interface FilterGroup {
  operator: "And" | "Or";
  filters: readonly FilterExpression[];
}

export type FilterExpression = FilterLeaf | FilterGroup;

// =============================================================================
// Query options
// =============================================================================

export interface SearchOptions {
  filters?: FilterExpression;
  groupBy?: GroupBy;
  rerank?: Rerank;
  sort?: Sort | readonly Sort[];
  limit?: number;
  offset?: number;
  /** Number of result jumps to cut off at (autocut). */
  autoLimit?: number;
  /** Cursor: uuid of the last object of the previous page. */
  after?: string;
  targetVector?: TargetVector;
  includeVector?: IncludeVector;
  returnMetadata?: ReturnMetadata;
  returnProperties?: readonly ReturnProperty[];
  returnReferences?: readonly QueryReference[];
  generate?: GenerateOptions;
}

export interface CallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export type QueryOptions = SearchOptions & CallOptions;

// =============================================================================
// Results
// =============================================================================

/** Only attributes the server marked as present are set. */
export interface ObjectMetadata {
  creationTime?: Date;
  lastUpdateTime?: Date;
  distance?: number;
  certainty?: number;
  score?: number;
  explainScore?: string;
  isConsistent?: boolean;
  rerankScore?: number;
}

/** Resolved reference property: the objects it points at. */
export interface CrossReference<P = Properties> {
  objects: readonly ReferencedObject<P>[];
}

export interface References {
  [linkOn: string]: CrossReference;
}

export interface ResultObject<P = Properties, R = References> {
  /** Absent when the server sent no id, which it may do when no metadata was requested. */
  uuid?: string;
  /** Collection the object was read from. */
  collection: string;
  properties: P;
  metadata: ObjectMetadata;
  references: R;
  /** Vector name to values; the unnamed vector is keyed `default`. */
  vectors: Readonly<Record<string, readonly number[]>>;
  generated?: string;
}

export type ReferencedObject<P = Properties> = ResultObject<P, References>;

export interface QueryReturn<P = Properties, R = References> {
  objects: readonly ResultObject<P, R>[];
  /** Output of a grouped generative task. */
  generated?: string;
}

export type GroupByObject<P = Properties, R = References> = ResultObject<P, R> & {
  belongsToGroup: string;
};

export interface Group<P = Properties, R = References> {
  name: string;
  minDistance: number;
  maxDistance: number;
  numberOfObjects: number;
  objects: readonly GroupByObject<P, R>[];
  rerankScore?: number;
  generated?: string;
}

export interface GroupByReturn<P = Properties, R = References> {
  /** All objects of all groups, in group order. */
  objects: readonly GroupByObject<P, R>[];
  groups: Readonly<Record<string, Group<P, R>>>;
  generated?: string;
}
