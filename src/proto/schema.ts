/**
 * Wire schema model for the `weaviate.v1` search protocol.
 *
 * The `.proto` files under `proto/v1` are the contract; this module mirrors
 * them for TypeScript. Request messages are plain types handed to the codec,
 * reply messages are zod schemas the codec validates decoded replies against.
 * Field names are the camelCase names protobufjs derives from the schema.
 */

import { z } from "zod";

// =============================================================================
// Enumerations
// =============================================================================

export enum ConsistencyLevel {
  CONSISTENCY_LEVEL_UNSPECIFIED = 0,
  CONSISTENCY_LEVEL_ONE = 1,
  CONSISTENCY_LEVEL_QUORUM = 2,
  CONSISTENCY_LEVEL_ALL = 3,
}

export enum FusionType {
  FUSION_TYPE_UNSPECIFIED = 0,
  FUSION_TYPE_RANKED = 1,
  FUSION_TYPE_RELATIVE_SCORE = 2,
}

/** `Filters.Operator` */
export enum FilterOperator {
  OPERATOR_UNSPECIFIED = 0,
  OPERATOR_EQUAL = 1,
  OPERATOR_NOT_EQUAL = 2,
  OPERATOR_GREATER_THAN = 3,
  OPERATOR_GREATER_THAN_EQUAL = 4,
  OPERATOR_LESS_THAN = 5,
  OPERATOR_LESS_THAN_EQUAL = 6,
  OPERATOR_AND = 7,
  OPERATOR_OR = 8,
  OPERATOR_WITHIN_GEO_RANGE = 9,
  OPERATOR_LIKE = 10,
  OPERATOR_IS_NULL = 11,
  OPERATOR_CONTAINS_ANY = 12,
  OPERATOR_CONTAINS_ALL = 13,
}

// =============================================================================
// Request messages
// =============================================================================

export type TextArray = { values: string[] };
export type IntArray = { values: number[] };
export type NumberArray = { values: number[] };
export type BooleanArray = { values: boolean[] };

export type GeoCoordinatesFilter = {
  latitude: number;
  longitude: number;
  distance: number;
};

/** Exactly one `value*` member is set on a leaf; none on an And/Or node. */
export type Filters = {
  operator: FilterOperator;
  on?: string[];
  filters?: Filters[];
  valueText?: string;
  valueInt?: number;
  valueBoolean?: boolean;
  valueNumber?: number;
  valueTextArray?: TextArray;
  valueIntArray?: IntArray;
  valueBooleanArray?: BooleanArray;
  valueNumberArray?: NumberArray;
  valueGeo?: GeoCoordinatesFilter;
};

export type GroupBy = {
  path: string[];
  numberOfGroups: number;
  objectsPerGroup: number;
};

export type SortBy = {
  ascending?: boolean;
  path: string[];
};

export type GenerativeSearch = {
  singleResponsePrompt?: string;
  groupedResponseTask?: string;
  groupedProperties?: string[];
};

export type MetadataRequest = {
  uuid?: boolean;
  vector?: boolean;
  creationTimeUnix?: boolean;
  lastUpdateTimeUnix?: boolean;
  distance?: boolean;
  certainty?: boolean;
  score?: boolean;
  explainScore?: boolean;
  isConsistent?: boolean;
  vectors?: string[];
};

export type ObjectPropertiesRequest = {
  propName: string;
  primitiveProperties?: string[];
  objectProperties?: ObjectPropertiesRequest[];
};

export type RefPropertiesRequest = {
  referenceProperty: string;
  properties?: PropertiesRequest;
  metadata?: MetadataRequest;
  targetCollection?: string;
};

export type PropertiesRequest = {
  nonRefProperties?: string[];
  refProperties?: RefPropertiesRequest[];
  objectProperties?: ObjectPropertiesRequest[];
  returnAllNonrefProperties?: boolean;
};

/** Shared by every near-* message; both scores are presence-tracked. */
type NearBounds = {
  certainty?: number;
  distance?: number;
  targetVectors?: string[];
};

export type NearVector = NearBounds & {
  /** Deprecated float list; decoded by servers, never emitted here. */
  vector?: number[];
  vectorBytes?: Uint8Array;
};

export type NearObject = NearBounds & { id: string };

export type NearTextMove = {
  force: number;
  concepts?: string[];
  uuids?: string[];
};

export type NearTextSearch = NearBounds & {
  query: string[];
  moveTo?: NearTextMove;
  moveAway?: NearTextMove;
};

export type NearImageSearch = NearBounds & { image: string };
export type NearAudioSearch = NearBounds & { audio: string };
export type NearVideoSearch = NearBounds & { video: string };
export type NearDepthSearch = NearBounds & { depth: string };
export type NearThermalSearch = NearBounds & { thermal: string };
export type NearIMUSearch = NearBounds & { imu: string };

export type BM25 = {
  query: string;
  properties?: string[];
};

export type Hybrid = {
  query: string;
  properties?: string[];
  alpha?: number;
  fusionType?: FusionType;
  vectorBytes?: Uint8Array;
  targetVectors?: string[];
  nearText?: NearTextSearch;
  nearVector?: NearVector;
};

export type Rerank = {
  property: string;
  query?: string;
};

export type SearchRequest = {
  collection: string;
  tenant?: string;
  consistencyLevel?: ConsistencyLevel;
  properties?: PropertiesRequest;
  metadata?: MetadataRequest;
  groupBy?: GroupBy;
  limit?: number;
  offset?: number;
  autocut?: number;
  after?: string;
  sortBy?: SortBy[];
  filters?: Filters;
  hybridSearch?: Hybrid;
  bm25Search?: BM25;
  nearVector?: NearVector;
  nearObject?: NearObject;
  nearText?: NearTextSearch;
  nearImage?: NearImageSearch;
  nearAudio?: NearAudioSearch;
  nearVideo?: NearVideoSearch;
  nearDepth?: NearDepthSearch;
  nearThermal?: NearThermalSearch;
  nearImu?: NearIMUSearch;
  generative?: GenerativeSearch;
  rerank?: Rerank;
};

/** The search-mode members of {@link SearchRequest}; at most one may be set. */
export const SEARCH_MODE_FIELDS = [
  "hybridSearch",
  "bm25Search",
  "nearVector",
  "nearObject",
  "nearText",
  "nearImage",
  "nearAudio",
  "nearVideo",
  "nearDepth",
  "nearThermal",
  "nearImu",
] as const;

export type SearchModeField = (typeof SEARCH_MODE_FIELDS)[number];

// =============================================================================
// Reply messages
// =============================================================================

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const bytes = z.instanceof(Uint8Array);

// --- google.protobuf.Struct (legacy property encoding) ------------------------

export interface StructValue {
  nullValue?: number;
  numberValue?: number;
  stringValue?: string;
  boolValue?: boolean;
  structValue?: Struct;
  listValue?: { values: StructValue[] };
}

export interface Struct {
  fields: Record<string, StructValue>;
}

export const StructValueSchema: Schema<StructValue> = z.lazy(() =>
  z.object({
    nullValue: z.number().optional(),
    numberValue: z.number().optional(),
    stringValue: z.string().optional(),
    boolValue: z.boolean().optional(),
    structValue: StructSchema.optional(),
    listValue: z.object({ values: z.array(StructValueSchema).default([]) }).optional(),
  })
);

export const StructSchema: Schema<Struct> = z.lazy(() =>
  z.object({ fields: z.record(StructValueSchema).default({}) })
);

// --- properties.proto ----------------------------------------------------------

export const GeoCoordinateSchema = z.object({
  longitude: z.number().default(0),
  latitude: z.number().default(0),
});

export const PhoneNumberSchema = z.object({
  countryCode: z.number().optional(),
  defaultCountry: z.string().optional(),
  input: z.string().optional(),
  internationalFormatted: z.string().optional(),
  national: z.number().optional(),
  nationalFormatted: z.string().optional(),
  valid: z.boolean().optional(),
});

export type PhoneNumberValue = z.output<typeof PhoneNumberSchema>;

export interface ListValue {
  values: Value[];
  numberValues?: { values?: Uint8Array };
  boolValues?: { values: boolean[] };
  objectValues?: { values: PropertiesValue[] };
  dateValues?: { values: string[] };
  uuidValues?: { values: string[] };
  intValues?: { values?: Uint8Array };
  textValues?: { values: string[] };
}

/** One member of the `kind` oneof is set. */
export interface Value {
  numberValue?: number;
  stringValue?: string;
  boolValue?: boolean;
  objectValue?: PropertiesValue;
  listValue?: ListValue;
  dateValue?: string;
  uuidValue?: string;
  intValue?: number;
  geoValue?: { longitude: number; latitude: number };
  blobValue?: string;
  phoneValue?: PhoneNumberValue;
  nullValue?: number;
  textValue?: string;
}

/** `Properties` message: a name to {@link Value} map. */
export interface PropertiesValue {
  fields: Record<string, Value>;
}

const stringList = z.object({ values: z.array(z.string()).default([]) });

export const ListValueSchema: Schema<ListValue> = z.lazy(() =>
  z.object({
    values: z.array(ValueSchema).default([]),
    numberValues: z.object({ values: bytes.optional() }).optional(),
    boolValues: z.object({ values: z.array(z.boolean()).default([]) }).optional(),
    objectValues: z.object({ values: z.array(PropertiesValueSchema).default([]) }).optional(),
    dateValues: stringList.optional(),
    uuidValues: stringList.optional(),
    intValues: z.object({ values: bytes.optional() }).optional(),
    textValues: stringList.optional(),
  })
);

export const ValueSchema: Schema<Value> = z.lazy(() =>
  z.object({
    numberValue: z.number().optional(),
    stringValue: z.string().optional(),
    boolValue: z.boolean().optional(),
    objectValue: PropertiesValueSchema.optional(),
    listValue: ListValueSchema.optional(),
    dateValue: z.string().optional(),
    uuidValue: z.string().optional(),
    intValue: z.number().optional(),
    geoValue: GeoCoordinateSchema.optional(),
    blobValue: z.string().optional(),
    phoneValue: PhoneNumberSchema.optional(),
    nullValue: z.number().optional(),
    textValue: z.string().optional(),
  })
);

export const PropertiesValueSchema: Schema<PropertiesValue> = z.lazy(() =>
  z.object({ fields: z.record(ValueSchema).default({}) })
);

// --- base.proto: legacy typed property arrays -----------------------------------

export const NumberArrayPropertiesSchema = z.object({
  values: z.array(z.number()).default([]),
  propName: z.string().default(""),
  valuesBytes: bytes.optional(),
});

export const IntArrayPropertiesSchema = z.object({
  values: z.array(z.number()).default([]),
  propName: z.string().default(""),
});

export const TextArrayPropertiesSchema = z.object({
  values: z.array(z.string()).default([]),
  propName: z.string().default(""),
});

export const BooleanArrayPropertiesSchema = z.object({
  values: z.array(z.boolean()).default([]),
  propName: z.string().default(""),
});

export type NumberArrayProperties = z.output<typeof NumberArrayPropertiesSchema>;
export type IntArrayProperties = z.output<typeof IntArrayPropertiesSchema>;
export type TextArrayProperties = z.output<typeof TextArrayPropertiesSchema>;
export type BooleanArrayProperties = z.output<typeof BooleanArrayPropertiesSchema>;

export interface ObjectPropertiesValue {
  nonRefProperties?: Struct;
  numberArrayProperties: NumberArrayProperties[];
  intArrayProperties: IntArrayProperties[];
  textArrayProperties: TextArrayProperties[];
  booleanArrayProperties: BooleanArrayProperties[];
  objectProperties: ObjectProperties[];
  objectArrayProperties: ObjectArrayProperties[];
  emptyListProps: string[];
}

export interface ObjectProperties {
  value?: ObjectPropertiesValue;
  propName: string;
}

export interface ObjectArrayProperties {
  values: ObjectPropertiesValue[];
  propName: string;
}

export const ObjectPropertiesValueSchema: Schema<ObjectPropertiesValue> = z.lazy(() =>
  z.object({
    nonRefProperties: StructSchema.optional(),
    numberArrayProperties: z.array(NumberArrayPropertiesSchema).default([]),
    intArrayProperties: z.array(IntArrayPropertiesSchema).default([]),
    textArrayProperties: z.array(TextArrayPropertiesSchema).default([]),
    booleanArrayProperties: z.array(BooleanArrayPropertiesSchema).default([]),
    objectProperties: z.array(ObjectPropertiesSchema).default([]),
    objectArrayProperties: z.array(ObjectArrayPropertiesSchema).default([]),
    emptyListProps: z.array(z.string()).default([]),
  })
);

export const ObjectPropertiesSchema: Schema<ObjectProperties> = z.lazy(() =>
  z.object({
    value: ObjectPropertiesValueSchema.optional(),
    propName: z.string().default(""),
  })
);

export const ObjectArrayPropertiesSchema: Schema<ObjectArrayProperties> = z.lazy(() =>
  z.object({
    values: z.array(ObjectPropertiesValueSchema).default([]),
    propName: z.string().default(""),
  })
);

// --- search_get.proto ----------------------------------------------------------

export const VectorsSchema = z.object({
  name: z.string().default(""),
  index: z.number().optional(),
  vectorBytes: bytes.optional(),
});

/**
 * Every optional scalar has a `*Present` companion; the value is meaningful
 * only when the companion is true, zero included.
 */
export const MetadataResultSchema = z.object({
  id: z.string().optional(),
  vector: z.array(z.number()).default([]),
  creationTimeUnix: z.number().optional(),
  creationTimeUnixPresent: z.boolean().optional(),
  lastUpdateTimeUnix: z.number().optional(),
  lastUpdateTimeUnixPresent: z.boolean().optional(),
  distance: z.number().optional(),
  distancePresent: z.boolean().optional(),
  certainty: z.number().optional(),
  certaintyPresent: z.boolean().optional(),
  score: z.number().optional(),
  scorePresent: z.boolean().optional(),
  explainScore: z.string().optional(),
  explainScorePresent: z.boolean().optional(),
  isConsistent: z.boolean().optional(),
  isConsistentPresent: z.boolean().optional(),
  generative: z.string().optional(),
  generativePresent: z.boolean().optional(),
  vectorBytes: bytes.optional(),
  idAsBytes: bytes.optional(),
  rerankScore: z.number().optional(),
  rerankScorePresent: z.boolean().optional(),
  vectors: z.array(VectorsSchema).default([]),
});

export type MetadataResult = z.output<typeof MetadataResultSchema>;

export interface RefPropertiesResult {
  properties: PropertiesResult[];
  propName: string;
}

export interface PropertiesResult {
  nonRefProperties?: Struct;
  refProps: RefPropertiesResult[];
  targetCollection?: string;
  metadata?: MetadataResult;
  numberArrayProperties: NumberArrayProperties[];
  intArrayProperties: IntArrayProperties[];
  textArrayProperties: TextArrayProperties[];
  booleanArrayProperties: BooleanArrayProperties[];
  objectProperties: ObjectProperties[];
  objectArrayProperties: ObjectArrayProperties[];
  nonRefProps?: PropertiesValue;
  refPropsRequested?: boolean;
}

export const RefPropertiesResultSchema: Schema<RefPropertiesResult> = z.lazy(() =>
  z.object({
    properties: z.array(PropertiesResultSchema).default([]),
    propName: z.string().default(""),
  })
);

export const PropertiesResultSchema: Schema<PropertiesResult> = z.lazy(() =>
  z.object({
    nonRefProperties: StructSchema.optional(),
    refProps: z.array(RefPropertiesResultSchema).default([]),
    targetCollection: z.string().optional(),
    metadata: MetadataResultSchema.optional(),
    numberArrayProperties: z.array(NumberArrayPropertiesSchema).default([]),
    intArrayProperties: z.array(IntArrayPropertiesSchema).default([]),
    textArrayProperties: z.array(TextArrayPropertiesSchema).default([]),
    booleanArrayProperties: z.array(BooleanArrayPropertiesSchema).default([]),
    objectProperties: z.array(ObjectPropertiesSchema).default([]),
    objectArrayProperties: z.array(ObjectArrayPropertiesSchema).default([]),
    nonRefProps: PropertiesValueSchema.optional(),
    refPropsRequested: z.boolean().optional(),
  })
);

/** `properties` is required: a result without it is not interpretable. */
export const SearchResultSchema = z.object({
  properties: PropertiesResultSchema,
  metadata: MetadataResultSchema.optional(),
});

export type SearchResult = z.output<typeof SearchResultSchema>;

export const GroupByResultSchema = z.object({
  name: z.string().default(""),
  minDistance: z.number().default(0),
  maxDistance: z.number().default(0),
  numberOfObjects: z.number().default(0),
  objects: z.array(SearchResultSchema).default([]),
  rerank: z.object({ score: z.number().default(0) }).optional(),
  generative: z.object({ result: z.string().default("") }).optional(),
});

export type GroupByResult = z.output<typeof GroupByResultSchema>;

export const SearchReplySchema = z.object({
  took: z.number().default(0),
  results: z.array(SearchResultSchema).default([]),
  generativeGroupedResult: z.string().optional(),
  groupByResults: z.array(GroupByResultSchema).default([]),
});

export type SearchReply = z.output<typeof SearchReplySchema>;
