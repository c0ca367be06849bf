/**
 * Client for the natural-language workflow service: generative feedback
 * loops that create or rewrite a property over a collection, and agent
 * queries answered from the collection's data.
 */

import { z } from "zod";

import { DecodeError } from "../errors";
import { HttpClient, type HttpResponse } from "./http-client";

// =============================================================================
// Responses
// =============================================================================

const WorkflowResponseSchema = z
  .object({ workflow_id: z.string() })
  .transform((r) => ({ workflowId: r.workflow_id }));

const AgentQueryResponseSchema = z
  .object({
    query: z.string(),
    answer: z.string(),
    function_calls: z.array(z.record(z.unknown())),
    tokens_used: z.number().int(),
    budget_remaining: z.number().int(),
    confidence_score: z.number(),
    sources: z.array(z.unknown()),
    execution_time: z.number(),
    llm_provider: z.record(z.string()),
  })
  .transform((r) => ({
    query: r.query,
    answer: r.answer,
    functionCalls: r.function_calls,
    tokensUsed: r.tokens_used,
    budgetRemaining: r.budget_remaining,
    confidenceScore: r.confidence_score,
    sources: r.sources,
    executionTime: r.execution_time,
    llmProvider: r.llm_provider,
  }));

const WorkflowStatusResponseSchema = z
  .object({
    workflow_id: z.string(),
    status: z.object({
      parent_state: z.string(),
      child_state: z.string(),
      batch_count: z.number().int(),
      total_items: z.number().int(),
      total_duration: z.number().nullish(),
      start_time: z.string().nullish(),
      end_time: z.string().nullish(),
    }),
  })
  .transform((r) => ({
    workflowId: r.workflow_id,
    status: {
      parentState: r.status.parent_state,
      childState: r.status.child_state,
      batchCount: r.status.batch_count,
      totalItems: r.status.total_items,
      totalDuration: r.status.total_duration ?? undefined,
      startTime: r.status.start_time ?? undefined,
      endTime: r.status.end_time ?? undefined,
    },
  }));

export type WorkflowResponse = z.output<typeof WorkflowResponseSchema>;
export type AgentQueryResponse = z.output<typeof AgentQueryResponseSchema>;
export type WorkflowStatusResponse = z.output<typeof WorkflowStatusResponseSchema>;

// =============================================================================
// Requests
// =============================================================================

export interface CreatePropertyParams {
  propertyName: string;
  /** Data type of the new property, e.g. `text` or `int`. */
  dataType: string;
  viewProperties: string[];
  instruction: string;
  /** Objects to run on; all objects when omitted. */
  uuids?: string[];
  tenant?: string;
  model?: string;
  apiKeyForModel?: string;
}

export interface UpdatePropertiesParams {
  instruction: string;
  viewProperties: string[];
  onProperties: string[];
  uuids?: string[];
  tenant?: string;
  model?: string;
  apiKeyForModel?: string;
}

export interface AgentQueryParams {
  query: string;
  /** Collections the agent may use; defaults to this client's collection. */
  collections?: { name: string; description?: string }[];
  tenant?: string;
  functions?: string[];
  callBudget?: number;
  llmProvider?: string;
  modelName?: string;
  apiKey?: string;
  description?: string;
}

export interface WorkflowClientOptions {
  collection: string;
  /** Where the workflow service reaches the database. */
  clusterUrl: string;
  /** Database credential, forwarded in the request body. */
  apiKey?: string;
}

const DEFAULT_FUNCTIONS = ["weaviate-search", "weaviate-gorilla"];

export class WorkflowClient {
  private readonly collection: string;
  private readonly clusterUrl: string;
  private readonly apiKey: string | null;

  constructor(private readonly http: HttpClient, options: WorkflowClientOptions) {
    this.collection = options.collection;
    this.clusterUrl = options.clusterUrl.replace(":443", "");
    this.apiKey = options.apiKey ?? null;
  }

  private get database(): { url: string; key: string | null } {
    return { url: this.clusterUrl, key: this.apiKey };
  }

  /** Start a loop that fills a new property on the collection. */
  async create(params: CreatePropertyParams): Promise<WorkflowResponse> {
    const response = await this.http.send("POST", "/gfls/create", {
      uuids: params.uuids ?? null,
      collection: this.collection,
      instruction: params.instruction,
      on_properties: [{ name: params.propertyName, data_type: params.dataType }],
      view_properties: params.viewProperties,
      weaviate: this.database,
      headers: this.http.getHeaders(),
      tenant: params.tenant ?? null,
      model: params.model ?? "weaviate",
      api_key_for_model: params.apiKeyForModel ?? null,
    });
    return parseResponse(WorkflowResponseSchema, response, "create");
  }

  /** Start a loop that rewrites existing properties. */
  async update(params: UpdatePropertiesParams): Promise<WorkflowResponse> {
    const response = await this.http.send("POST", "/gfls/update", {
      uuids: params.uuids ?? null,
      collection: this.collection,
      instruction: params.instruction,
      on_properties: params.onProperties,
      view_properties: params.viewProperties,
      weaviate: this.database,
      headers: this.http.getHeaders(),
      tenant: params.tenant ?? null,
      model: params.model ?? "weaviate",
      api_key_for_model: params.apiKeyForModel ?? null,
    });
    return parseResponse(WorkflowResponseSchema, response, "update");
  }

  /** Ask the agent a natural-language question. */
  async query(params: AgentQueryParams): Promise<AgentQueryResponse> {
    const apiKey = params.apiKey ?? null;
    const response = await this.http.send("POST", "/agent/query", {
      query: params.query,
      weaviate: this.database,
      collections: params.collections ?? [{ name: this.collection, description: params.description ?? null }],
      tenant: params.tenant ?? null,
      functions: params.functions ?? DEFAULT_FUNCTIONS,
      call_budget: params.callBudget ?? 20,
      llm_provider: {
        provider: params.llmProvider ?? "openai",
        provider_model_name: params.modelName ?? "gpt-4",
        api_key: apiKey,
      },
      headers: { "X-OpenAI-Api-Key": apiKey },
    });
    return parseResponse(AgentQueryResponseSchema, response, "query");
  }

  async status(workflowId: string): Promise<WorkflowStatusResponse> {
    const response = await this.http.send("GET", `/gfls/status/${encodeURIComponent(workflowId)}`);
    return parseResponse(WorkflowStatusResponseSchema, response, "status");
  }
}

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, response: HttpResponse, operation: string): T {
  const parsed = schema.safeParse(response.body);
  if (parsed.success) {
    return parsed.data;
  }
  const issue = parsed.error.issues[0];
  const path = issue.path.join(".");
  throw new DecodeError(
    `Workflow ${operation} returned an unexpected body (status ${response.status}) at '${path}': ${issue.message}`,
    path,
    { cause: parsed.error }
  );
}
