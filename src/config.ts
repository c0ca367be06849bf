import { z } from "zod";

import { InvalidArgumentError } from "./errors";

const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR", "SILENT"] as const;

export const ClientConfigSchema = z.object({
  /** gRPC endpoint as `host:port`. */
  address: z.string().min(1).default("localhost:50051"),
  /** Use TLS for the gRPC channel. */
  secure: z.boolean().default(false),
  /** Sent as a bearer token on every call. */
  apiKey: z.string().min(1).optional(),
  /** Extra metadata attached to every call. */
  headers: z.record(z.string()).default({}),
  /** Upper bound for a single search round trip. */
  timeoutMs: z.number().int().positive().default(30_000),
  /** Base URL of the natural-language workflow service. */
  workflowUrl: z.string().url().optional(),
  workflowTimeoutMs: z.number().int().positive().default(40_000),
  /** Left unset, the logger keeps `POWERTOOLS_LOG_LEVEL` or its own default. */
  logLevel: z.enum(LOG_LEVELS).optional(),
});

export type ClientConfig = z.output<typeof ClientConfigSchema>;
export type PartialClientConfig = z.input<typeof ClientConfigSchema>;

type Env = Record<string, string | undefined>;

function parseBoolean(raw: string): boolean {
  return raw === "true" || raw === "1";
}

/** Settings found in the environment; unset variables are left out. */
function fromEnv(env: Env): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  if (env.VQC_GRPC_ADDRESS) values.address = env.VQC_GRPC_ADDRESS;
  if (env.VQC_SECURE) values.secure = parseBoolean(env.VQC_SECURE);
  if (env.VQC_API_KEY) values.apiKey = env.VQC_API_KEY;
  if (env.VQC_TIMEOUT_MS) values.timeoutMs = Number(env.VQC_TIMEOUT_MS);
  if (env.VQC_WORKFLOW_URL) values.workflowUrl = env.VQC_WORKFLOW_URL;
  if (env.VQC_LOG_LEVEL) values.logLevel = env.VQC_LOG_LEVEL.toUpperCase();
  return values;
}

/**
 * Resolve the client configuration.
 *
 * Precedence: defaults < environment < explicit overrides.
 */
export function loadConfig(overrides: PartialClientConfig = {}, env: Env = process.env): ClientConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const parsed = ClientConfigSchema.safeParse({ ...fromEnv(env), ...defined });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidArgumentError(
      `Invalid client configuration at '${issue.path.join(".")}': ${issue.message}`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}
