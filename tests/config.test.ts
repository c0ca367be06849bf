import { describe, it, expect } from "vitest";

import { loadConfig } from "../src/config";
import { InvalidArgumentError } from "../src/errors";

describe("loadConfig", () => {
  it("fills defaults", () => {
    expect(loadConfig({}, {})).toEqual({
      address: "localhost:50051",
      secure: false,
      headers: {},
      timeoutMs: 30_000,
      workflowTimeoutMs: 40_000,
    });
  });

  it("reads the environment", () => {
    const config = loadConfig(
      {},
      {
        VQC_GRPC_ADDRESS: "db.internal:50051",
        VQC_SECURE: "true",
        VQC_API_KEY: "test-secret",
        VQC_TIMEOUT_MS: "500",
        VQC_WORKFLOW_URL: "http://workflows.test",
        VQC_LOG_LEVEL: "debug",
      }
    );

    expect(config).toMatchObject({
      address: "db.internal:50051",
      secure: true,
      apiKey: "test-secret",
      timeoutMs: 500,
      workflowUrl: "http://workflows.test",
      logLevel: "DEBUG",
    });
  });

  it("lets explicit settings override the environment", () => {
    const env = { VQC_GRPC_ADDRESS: "db.internal:50051", VQC_SECURE: "1" };

    expect(loadConfig({ address: "override:50051", secure: false }, env)).toMatchObject({
      address: "override:50051",
      secure: false,
    });
    expect(loadConfig({ address: undefined }, env).address).toBe("db.internal:50051");
  });

  it("rejects invalid values with the offending setting", () => {
    expect(() => loadConfig({}, { VQC_TIMEOUT_MS: "soon" })).toThrow(InvalidArgumentError);
    expect(() => loadConfig({}, { VQC_TIMEOUT_MS: "soon" })).toThrow("Invalid client configuration at 'timeoutMs'");
    expect(() => loadConfig({ workflowUrl: "not a url" }, {})).toThrow("at 'workflowUrl': Invalid url");
  });
});
