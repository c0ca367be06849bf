/**
 * Minimal JSON-over-HTTP client for the workflow service.
 */

import { ConnectionError, DecodeError } from "../errors";
import { getLogger } from "../logger";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface HttpResponse {
  status: number;
  ok: boolean;
  /** Parsed JSON for JSON responses, raw bytes otherwise. */
  body: unknown;
}

export interface HttpClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export class HttpClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.timeoutMs = options.timeoutMs ?? 40_000;
    this.headers = { "Content-Type": "application/json", ...options.headers };
  }

  /** Headers sent with every request. */
  getHeaders(): Record<string, string> {
    return { ...this.headers };
  }

  /**
   * Send one request. A failed POST is logged and returned so the caller can
   * inspect the body; any other method fails on a non-2xx status.
   */
  async send(method: HttpMethod, path: string, body?: unknown): Promise<HttpResponse> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: this.headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new ConnectionError(`${method} ${path} timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw new ConnectionError(
        `${method} ${path} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
    }

    const result: HttpResponse = {
      status: response.status,
      ok: response.ok,
      body: await readBody(response, `${method} ${path}`),
    };

    if (!response.ok) {
      if (method !== "POST") {
        throw new ConnectionError(`${method} ${path} failed with status ${response.status}`);
      }
      getLogger().error("Workflow request failed", { method, path, status: response.status, body: result.body });
    }
    return result;
  }
}

async function readBody(response: Response, request: string): Promise<unknown> {
  const contentType = response.headers.get("content-type") ?? "";
  if (!contentType.includes("json")) {
    return new Uint8Array(await response.arrayBuffer());
  }
  const text = await response.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DecodeError(`${request} returned malformed JSON`, "", { cause: error });
  }
}
