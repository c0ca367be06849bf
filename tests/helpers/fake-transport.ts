import { decodeSearchRequest, encodeSearchReply } from "../../src/proto/codec";
import type { SendOptions, Transport } from "../../src/transport";

/**
 * In-process stand-in for the search service: records every request it is
 * sent (decoded back to a plain object) and answers with a canned reply.
 */
export class FakeTransport implements Transport {
  readonly requests: Record<string, unknown>[] = [];
  readonly calls: SendOptions[] = [];
  connected = false;

  private reply: Record<string, unknown>;
  private failure: Error | null = null;

  constructor(reply: Record<string, unknown> = {}) {
    this.reply = reply;
  }

  respondWith(reply: Record<string, unknown>): void {
    this.reply = reply;
    this.failure = null;
  }

  failWith(error: Error): void {
    this.failure = error;
  }

  get lastRequest(): Record<string, unknown> {
    const request = this.requests[this.requests.length - 1];
    if (!request) {
      throw new Error("No request was sent");
    }
    return request;
  }

  connect(): void {
    this.connected = true;
  }

  close(): void {
    this.connected = false;
  }

  async send(request: Uint8Array, options: SendOptions = {}): Promise<Uint8Array> {
    this.requests.push(decodeSearchRequest(request));
    this.calls.push(options);
    if (this.failure) {
      throw this.failure;
    }
    return encodeSearchReply(this.reply);
  }
}
