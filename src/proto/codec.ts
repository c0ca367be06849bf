/**
 * Binary codec for the search protocol.
 *
 * The schema is loaded at run time from the bundled `.proto` files with
 * protobufjs; replies are converted to plain objects and validated against the
 * zod reply schemas, so callers only ever see well-formed {@link SearchReply}s.
 */

import path from "node:path";
import { Root, type IConversionOptions, type Type } from "protobufjs";
import type { ZodIssue } from "zod";

import { DecodeError, InvalidArgumentError } from "../errors";
import { SearchReplySchema, type SearchReply, type SearchRequest } from "./schema";

const PROTO_DIR = path.resolve(__dirname, "../../proto");
const ENTRY_FILE = "v1/weaviate.proto";

export const PACKAGE_NAME = "weaviate.v1";
export const SERVICE_NAME = `${PACKAGE_NAME}.Weaviate`;

/** int64 as number, empty repeated and map fields present, no defaults. */
const REPLY_CONVERSION: IConversionOptions = {
  longs: Number,
  enums: Number,
  arrays: true,
  objects: true,
  defaults: false,
};

const REQUEST_CONVERSION: IConversionOptions = {
  longs: Number,
  enums: Number,
  defaults: false,
};

let root: Root | null = null;

/** Parse and resolve the `.proto` files once per process. */
export function loadWireSchema(): Root {
  if (!root) {
    const schema = new Root();
    schema.resolvePath = (_origin, target) => path.join(PROTO_DIR, target);
    schema.loadSync(ENTRY_FILE);
    schema.resolveAll();
    root = schema;
  }
  return root;
}

function messageType(name: string): Type {
  return loadWireSchema().lookupType(`${PACKAGE_NAME}.${name}`);
}

/** Path of a unary method on the search service, as gRPC addresses it. */
export function methodPath(method: string): string {
  const service = loadWireSchema().lookupService(SERVICE_NAME);
  const rpc = service.methods[method];
  if (!rpc) {
    throw new InvalidArgumentError(`Unknown method '${method}' on ${SERVICE_NAME}`);
  }
  return `/${SERVICE_NAME}/${rpc.name}`;
}

function encode(typeName: string, value: Record<string, unknown>): Uint8Array {
  const type = messageType(typeName);
  const problem = type.verify(value);
  if (problem) {
    throw new InvalidArgumentError(`Invalid ${typeName}: ${problem}`);
  }
  return type.encode(type.fromObject(value)).finish();
}

function decode(typeName: string, bytes: Uint8Array, options: IConversionOptions): Record<string, unknown> {
  const type = messageType(typeName);
  try {
    return type.toObject(type.decode(bytes), options);
  } catch (error) {
    throw new DecodeError(`Malformed ${typeName}: ${error instanceof Error ? error.message : String(error)}`, "", {
      cause: error,
    });
  }
}

function describeIssue(issue: ZodIssue): string {
  const where = issue.path.join(".");
  return where ? `${where}: ${issue.message}` : issue.message;
}

// =============================================================================
// Search
// =============================================================================

export function encodeSearchRequest(request: SearchRequest): Uint8Array {
  return encode("SearchRequest", request);
}

export function decodeSearchReply(bytes: Uint8Array): SearchReply {
  const parsed = SearchReplySchema.safeParse(decode("SearchReply", bytes, REPLY_CONVERSION));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DecodeError(`Invalid SearchReply at ${describeIssue(issue)}`, issue.path.join("."), {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

// =============================================================================
// Server side of the codec (stubs, fixtures)
// =============================================================================

/** Decode request bytes to a plain object, leaving unset fields out. */
export function decodeSearchRequest(bytes: Uint8Array): Record<string, unknown> {
  return decode("SearchRequest", bytes, REQUEST_CONVERSION);
}

export function encodeSearchReply(reply: Record<string, unknown>): Uint8Array {
  return encode("SearchReply", reply);
}
