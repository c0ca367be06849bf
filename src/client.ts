/**
 * Query client: per-collection search API over the gRPC search service.
 */

import { InvalidArgumentError } from "./errors";
import { loadConfig, type ClientConfig, type PartialClientConfig } from "./config";
import { getLogger, setLogLevel } from "./logger";
import { decodeSearchReply, encodeSearchRequest } from "./proto/codec";
import type { SearchReply, SearchRequest } from "./proto/schema";
import { buildSearchRequest } from "./query/builder";
import { Filter } from "./query/filters";
import { decodeQueryReply } from "./result/decoder";
import {
  projectGroupByReturn,
  projectQueryReturn,
  propertiesFromSchema,
  type ProjectedReferences,
  type ReferenceShapes,
  type ReturnShape,
} from "./result/projection";
import { GrpcTransport, toTransportError, type Transport } from "./transport";
import type {
  CallOptions,
  ConsistencyLevel,
  GroupBy,
  GroupByReturn,
  HybridFusion,
  Media,
  Move,
  NearMediaType,
  Properties,
  QueryOptions,
  QueryReturn,
  References,
  ResultObject,
  ReturnProperty,
  SearchMode,
} from "./types";
import { HttpClient } from "./workflow/http-client";
import { WorkflowClient } from "./workflow/workflow-client";

// =============================================================================
// Per-mode options
// =============================================================================

export interface NearOptions extends QueryOptions {
  certainty?: number;
  distance?: number;
}

export interface NearTextOptions extends NearOptions {
  moveTo?: Move;
  moveAway?: Move;
}

export interface BM25Options extends QueryOptions {
  /** Properties to search in; all text properties when omitted. */
  queryProperties?: readonly string[];
}

export interface HybridOptions extends BM25Options {
  alpha?: number;
  vector?: readonly number[];
  fusionType?: HybridFusion;
}

export type FetchOptions = QueryOptions;

type Grouped<O> = O & { groupBy: GroupBy };
type Ungrouped<O> = O & { groupBy?: undefined };

// =============================================================================
// Search execution
// =============================================================================

/** Encodes, sends and decodes one search round trip. */
export class SearchExecutor {
  constructor(private readonly transport: Transport) {}

  async search(request: SearchRequest, call: CallOptions): Promise<SearchReply> {
    const logger = getLogger();
    const bytes = encodeSearchRequest(request);
    logger.debug("Sending search request", { collection: request.collection, bytes: bytes.byteLength });
    const reply = decodeSearchReply(await this.send(bytes, call));
    logger.debug("Received search reply", {
      collection: request.collection,
      took: reply.took,
      results: reply.results.length,
      groups: reply.groupByResults.length,
    });
    return reply;
  }

  private async send(bytes: Uint8Array, call: CallOptions): Promise<Uint8Array> {
    try {
      return await this.transport.send(bytes, call);
    } catch (error) {
      throw toTransportError(error);
    }
  }
}

/** Turns decoded generic results into the handle's return type. */
export interface Projector<P, R> {
  returnProperties?: ReturnProperty[];
  objects(result: QueryReturn): QueryReturn<P, R>;
  groups(result: GroupByReturn): GroupByReturn<P, R>;
}

const genericProjector: Projector<Properties, References> = {
  objects: (result) => result,
  groups: (result) => result,
};

function shapeProjector<P, R extends ReferenceShapes>(shape: ReturnShape<P, R>): Projector<P, ProjectedReferences<R>> {
  return {
    returnProperties: propertiesFromSchema(shape.properties),
    objects: (result) => projectQueryReturn(result, shape),
    groups: (result) => projectGroupByReturn(result, shape),
  };
}

export interface CollectionScope {
  tenant?: string;
  consistencyLevel?: ConsistencyLevel;
}

// =============================================================================
// Collection handle
// =============================================================================

/**
 * Queries against one collection. Handles are immutable: `withTenant`,
 * `withConsistency` and `withReturnType` return new ones. Obtain one from
 * {@link QueryClient.collection}.
 */
export class CollectionQuery<P = Properties, R = References> {
  constructor(
    private readonly executor: SearchExecutor,
    readonly name: string,
    private readonly scope: CollectionScope,
    private readonly projector: Projector<P, R>
  ) {}

  get tenant(): string | undefined {
    return this.scope.tenant;
  }

  get consistencyLevel(): ConsistencyLevel | undefined {
    return this.scope.consistencyLevel;
  }

  withTenant(tenant: string | undefined): CollectionQuery<P, R> {
    return new CollectionQuery(this.executor, this.name, { ...this.scope, tenant }, this.projector);
  }

  withConsistency(consistencyLevel: ConsistencyLevel | undefined): CollectionQuery<P, R> {
    return new CollectionQuery(this.executor, this.name, { ...this.scope, consistencyLevel }, this.projector);
  }

  /** Decode properties (and declared references) into the given zod shapes. */
  withReturnType<TP, TR extends ReferenceShapes = {}>(
    shape: ReturnShape<TP, TR>
  ): CollectionQuery<TP, ProjectedReferences<TR>> {
    return new CollectionQuery(this.executor, this.name, this.scope, shapeProjector(shape));
  }

  // ---------------------------------------------------------------------------
  // Search modes
  // ---------------------------------------------------------------------------

  nearVector(vector: readonly number[], options: Grouped<NearOptions>): Promise<GroupByReturn<P, R>>;
  nearVector(vector: readonly number[], options?: Ungrouped<NearOptions>): Promise<QueryReturn<P, R>>;
  nearVector(vector: readonly number[], options: NearOptions = {}): Promise<QueryReturn<P, R> | GroupByReturn<P, R>> {
    return this.run({ kind: "nearVector", vector, certainty: options.certainty, distance: options.distance }, options);
  }

  nearObject(id: string, options: Grouped<NearOptions>): Promise<GroupByReturn<P, R>>;
  nearObject(id: string, options?: Ungrouped<NearOptions>): Promise<QueryReturn<P, R>>;
  nearObject(id: string, options: NearOptions = {}): Promise<QueryReturn<P, R> | GroupByReturn<P, R>> {
    return this.run({ kind: "nearObject", id, certainty: options.certainty, distance: options.distance }, options);
  }

  nearText(query: string | readonly string[], options: Grouped<NearTextOptions>): Promise<GroupByReturn<P, R>>;
  nearText(query: string | readonly string[], options?: Ungrouped<NearTextOptions>): Promise<QueryReturn<P, R>>;
  nearText(
    query: string | readonly string[],
    options: NearTextOptions = {}
  ): Promise<QueryReturn<P, R> | GroupByReturn<P, R>> {
    return this.run(
      {
        kind: "nearText",
        query,
        certainty: options.certainty,
        distance: options.distance,
        moveTo: options.moveTo,
        moveAway: options.moveAway,
      },
      options
    );
  }

  nearMedia(media: Media, mediaType: NearMediaType, options: Grouped<NearOptions>): Promise<GroupByReturn<P, R>>;
  nearMedia(media: Media, mediaType: NearMediaType, options?: Ungrouped<NearOptions>): Promise<QueryReturn<P, R>>;
  nearMedia(
    media: Media,
    mediaType: NearMediaType,
    options: NearOptions = {}
  ): Promise<QueryReturn<P, R> | GroupByReturn<P, R>> {
    return this.run(
      { kind: "nearMedia", media, mediaType, certainty: options.certainty, distance: options.distance },
      options
    );
  }

  nearImage(image: Media, options: Grouped<NearOptions>): Promise<GroupByReturn<P, R>>;
  nearImage(image: Media, options?: Ungrouped<NearOptions>): Promise<QueryReturn<P, R>>;
  nearImage(image: Media, options: NearOptions = {}): Promise<QueryReturn<P, R> | GroupByReturn<P, R>> {
    return this.run(
      { kind: "nearMedia", media: image, mediaType: "image", certainty: options.certainty, distance: options.distance },
      options
    );
  }

  bm25(query: string, options: Grouped<BM25Options>): Promise<GroupByReturn<P, R>>;
  bm25(query: string, options?: Ungrouped<BM25Options>): Promise<QueryReturn<P, R>>;
  bm25(query: string, options: BM25Options = {}): Promise<QueryReturn<P, R> | GroupByReturn<P, R>> {
    return this.run({ kind: "bm25", query, queryProperties: options.queryProperties }, options);
  }

  hybrid(query: string, options: Grouped<HybridOptions>): Promise<GroupByReturn<P, R>>;
  hybrid(query: string, options?: Ungrouped<HybridOptions>): Promise<QueryReturn<P, R>>;
  hybrid(query: string, options: HybridOptions = {}): Promise<QueryReturn<P, R> | GroupByReturn<P, R>> {
    return this.run(
      {
        kind: "hybrid",
        query,
        alpha: options.alpha,
        vector: options.vector,
        queryProperties: options.queryProperties,
        fusionType: options.fusionType,
      },
      options
    );
  }

  fetchObjects(options: Grouped<FetchOptions>): Promise<GroupByReturn<P, R>>;
  fetchObjects(options?: Ungrouped<FetchOptions>): Promise<QueryReturn<P, R>>;
  fetchObjects(options: FetchOptions = {}): Promise<QueryReturn<P, R> | GroupByReturn<P, R>> {
    return this.run({ kind: "fetch" }, options);
  }

  /** One object by uuid, or `null` when it does not exist. */
  async fetchObjectById(
    uuid: string,
    options: Omit<FetchOptions, "filters" | "groupBy" | "limit" | "offset" | "after" | "sort"> = {}
  ): Promise<ResultObject<P, R> | null> {
    const result = await this.fetchObjects({ ...options, filters: Filter.byId().equal(uuid), limit: 1 });
    return result.objects[0] ?? null;
  }

  private async run(mode: SearchMode, options: QueryOptions): Promise<QueryReturn<P, R> | GroupByReturn<P, R>> {
    const returnProperties = options.returnProperties ?? this.projector.returnProperties;
    const request = buildSearchRequest(this.name, mode, {
      ...options,
      returnProperties,
      tenant: this.scope.tenant,
      consistencyLevel: this.scope.consistencyLevel,
    });
    const reply = await this.executor.search(request, { signal: options.signal, timeoutMs: options.timeoutMs });
    const decoded = decodeQueryReply(reply, {
      collection: this.name,
      includeVector: options.includeVector,
      returnProperties,
      returnReferences: options.returnReferences,
      groupBy: options.groupBy,
    });
    return decoded.kind === "groups" ? this.projector.groups(decoded.result) : this.projector.objects(decoded.result);
  }
}

// =============================================================================
// Client
// =============================================================================

export class QueryClient {
  readonly config: ClientConfig;
  private readonly transport: Transport;
  private readonly executor: SearchExecutor;
  private readonly workflowHttp: HttpClient | null;

  /**
   * @param config - merged over `VQC_*` environment variables and defaults
   * @param transport - replaces the gRPC transport, e.g. with an in-process stub
   */
  constructor(config: PartialClientConfig = {}, transport?: Transport) {
    this.config = loadConfig(config);
    if (this.config.logLevel) setLogLevel(this.config.logLevel);
    this.transport = transport ?? new GrpcTransport(this.config);
    this.executor = new SearchExecutor(this.transport);
    this.workflowHttp = this.config.workflowUrl
      ? new HttpClient({
          baseUrl: this.config.workflowUrl,
          timeoutMs: this.config.workflowTimeoutMs,
          headers: this.config.headers,
        })
      : null;
  }

  /** Open the underlying channel. Queries also connect lazily. */
  connect(): void {
    this.transport.connect();
  }

  close(): void {
    this.transport.close();
  }

  collection(name: string, scope: CollectionScope = {}): CollectionQuery {
    if (!name) {
      throw new InvalidArgumentError("A collection name is required");
    }
    return new CollectionQuery(this.executor, name, scope, genericProjector);
  }

  /** Workflow operations on one collection; needs `workflowUrl` configured. */
  workflows(collection: string): WorkflowClient {
    if (!this.workflowHttp) {
      throw new InvalidArgumentError("No workflow service configured; set workflowUrl or VQC_WORKFLOW_URL");
    }
    const scheme = this.config.secure ? "https" : "http";
    return new WorkflowClient(this.workflowHttp, {
      collection,
      clusterUrl: `${scheme}://${this.config.address}`,
      apiKey: this.config.apiKey,
    });
  }
}
