export { QueryClient, CollectionQuery } from "./client";
export type {
  BM25Options,
  CollectionScope,
  FetchOptions,
  HybridOptions,
  NearOptions,
  NearTextOptions,
} from "./client";
export { loadConfig, ClientConfigSchema } from "./config";
export type { ClientConfig, PartialClientConfig } from "./config";
export {
  QueryClientError,
  InvalidArgumentError,
  ConnectionError,
  QueryError,
  DecodeError,
  TypeMismatchError,
} from "./errors";
export type { ErrorCode } from "./errors";
export { getLogger, setLogLevel } from "./logger";
export type { LogLevelName } from "./logger";
export { Filter, FilterTarget, ReferenceFilterTarget, toWireFilters } from "./query/filters";
export { buildSearchRequest, DEFAULT_HYBRID_ALPHA } from "./query/builder";
export type { BuildOptions } from "./query/builder";
export { decodeQueryReply } from "./result/decoder";
export type { DecodeOptions, DecodedReply } from "./result/decoder";
export { returnShape, propertiesFromSchema, projectObject } from "./result/projection";
export type { ReturnShape, ReferenceShapes, ProjectedReferences } from "./result/projection";
export { GrpcTransport, SearchServiceDefinition } from "./transport";
export type { Transport, SendOptions } from "./transport";
export { encodeSearchRequest, decodeSearchReply } from "./proto/codec";
export { HttpClient } from "./workflow/http-client";
export type { HttpMethod, HttpResponse, HttpClientOptions } from "./workflow/http-client";
export { WorkflowClient } from "./workflow/workflow-client";
export type {
  AgentQueryParams,
  AgentQueryResponse,
  CreatePropertyParams,
  UpdatePropertiesParams,
  WorkflowClientOptions,
  WorkflowResponse,
  WorkflowStatusResponse,
} from "./workflow/workflow-client";
export { allMetadata, METADATA_NAMES } from "./types";
export type {
  ConsistencyLevel,
  CrossReference,
  FilterExpression,
  FilterGroup,
  FilterLeaf,
  FilterOperator,
  FilterValue,
  GenerateOptions,
  GeoCoordinate,
  GeoRange,
  Group,
  GroupBy,
  GroupByObject,
  GroupByReturn,
  HybridFusion,
  IncludeVector,
  Media,
  MetadataName,
  MetadataQuery,
  Move,
  NearMediaType,
  ObjectMetadata,
  PhoneNumber,
  Properties,
  PropertyValue,
  QueryNested,
  QueryOptions,
  QueryReference,
  QueryReturn,
  ReferencedObject,
  References,
  Rerank,
  ResultObject,
  ReturnMetadata,
  ReturnProperty,
  SearchMode,
  Sort,
  TargetVector,
} from "./types";
