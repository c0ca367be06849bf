/**
 * gRPC transport for the search service.
 *
 * Requests and replies travel as raw bytes; encoding happens in the codec, so
 * the service definition below passes bytes through unchanged.
 */

import { ChannelCredentials } from "@grpc/grpc-js";
import { createChannel, createClient, ClientError, Metadata, Status, type Channel, type Client } from "nice-grpc";

import type { ClientConfig } from "./config";
import { ConnectionError, QueryClientError, QueryError } from "./errors";
import { getLogger } from "./logger";

const passThrough = (value: Uint8Array): Uint8Array => value;

export const SearchServiceDefinition = {
  search: {
    path: "/weaviate.v1.Weaviate/Search",
    requestStream: false,
    responseStream: false,
    requestSerialize: passThrough,
    requestDeserialize: passThrough,
    responseSerialize: passThrough,
    responseDeserialize: passThrough,
    options: {},
  },
} as const;

type SearchClient = Client<typeof SearchServiceDefinition>;

export interface SendOptions {
  signal?: AbortSignal;
  /** Overrides the configured per-call timeout. */
  timeoutMs?: number;
}

/** `send(requestBytes) -> replyBytes`; failures arrive as {@link QueryClientError}s. */
export interface Transport {
  connect(): void;
  send(request: Uint8Array, options?: SendOptions): Promise<Uint8Array>;
  close(): void;
}

export class GrpcTransport implements Transport {
  private channel: Channel | null = null;
  private client: SearchClient | null = null;

  constructor(private readonly config: ClientConfig) {}

  /** Open the channel. Calling it again on an open transport is a no-op. */
  connect(): void {
    if (this.channel) return;
    const credentials = this.config.secure
      ? ChannelCredentials.createSsl()
      : ChannelCredentials.createInsecure();
    this.channel = createChannel(this.config.address, credentials);
    this.client = createClient(SearchServiceDefinition, this.channel, {
      "*": { metadata: this.callMetadata() },
    });
    getLogger().debug("gRPC channel opened", { address: this.config.address, secure: this.config.secure });
  }

  close(): void {
    if (this.channel) {
      this.channel.close();
      this.channel = null;
      this.client = null;
    }
  }

  async send(request: Uint8Array, options: SendOptions = {}): Promise<Uint8Array> {
    if (!this.client) {
      this.connect();
    }
    const client = this.client;
    if (!client) {
      throw new ConnectionError("Transport is not connected");
    }

    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const forwardAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    try {
      return await client.search(request, { signal: controller.signal });
    } catch (error) {
      throw toTransportError(error, timedOut ? timeoutMs : undefined);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private callMetadata(): Metadata {
    const metadata = new Metadata(this.config.headers);
    if (this.config.apiKey) {
      metadata.set("authorization", `Bearer ${this.config.apiKey}`);
    }
    return metadata;
  }
}

// =============================================================================
// Error mapping
// =============================================================================

const CONNECTION_STATUSES: ReadonlySet<Status> = new Set([Status.UNAVAILABLE, Status.DEADLINE_EXCEEDED]);

/**
 * Wrap anything a call can throw into the client's error taxonomy.
 *
 * `timeoutMs` is given when the call was aborted by the transport's own timer
 * rather than by the caller.
 */
export function toTransportError(error: unknown, timeoutMs?: number): QueryClientError {
  if (error instanceof QueryClientError) {
    return error;
  }
  if (error instanceof ClientError) {
    if (CONNECTION_STATUSES.has(error.code)) {
      return new ConnectionError(`Search call failed: ${Status[error.code]}: ${error.details}`, { cause: error });
    }
    return new QueryError(`Query rejected: ${Status[error.code]}: ${error.details}`, error.code, { cause: error });
  }
  if (error instanceof Error && error.name === "AbortError") {
    const message = timeoutMs === undefined ? "Search call cancelled" : `Search call timed out after ${timeoutMs}ms`;
    return new ConnectionError(message, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ConnectionError(`Search call failed: ${message}`, { cause: error });
}
