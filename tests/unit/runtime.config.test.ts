import { resolvePipelineConfig } from "../../src/application/pipeline/pipeline.config";
import { loadRuntimeConfigFromEnv } from "../../src/shared/config/runtime.config";

describe("runtime config caps", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadRuntimeConfigFromEnv({})).toEqual({
      pipelineConfig: {
        waitTimeoutMs: 600000,
        pollIntervalMs: 5000,
        uploadConcurrency: 4,
        markerFileName: ".backup_complete"
      }
    });
  });

  it("accepts boundary values within allowed caps", () => {
    const runtime = loadRuntimeConfigFromEnv({
      WAIT_TIMEOUT_MS: "86400000",
      WAIT_POLL_INTERVAL_MS: "1",
      UPLOAD_CONCURRENCY: "50",
      PIPELINE_CONCURRENCY: "1"
    });

    expect(runtime).toEqual({
      maxConcurrency: 1,
      pipelineConfig: {
        waitTimeoutMs: 86400000,
        pollIntervalMs: 1,
        uploadConcurrency: 50,
        markerFileName: ".backup_complete"
      }
    });
  });

  it.each([
    { env: { WAIT_TIMEOUT_MS: "86400001" }, message: "WAIT_TIMEOUT_MS=86400001 is out of allowed range [0..86400000]" },
    { env: { WAIT_POLL_INTERVAL_MS: "0" }, message: "WAIT_POLL_INTERVAL_MS=0 is out of allowed range [1..600000]" },
    { env: { UPLOAD_CONCURRENCY: "51" }, message: "UPLOAD_CONCURRENCY=51 is out of allowed range [1..50]" },
    { env: { PIPELINE_CONCURRENCY: "1.5" }, message: "PIPELINE_CONCURRENCY=1.5 is out of allowed range [1..50]" },
    { env: { WAIT_TIMEOUT_MS: "soon" }, message: "WAIT_TIMEOUT_MS=soon is out of allowed range [0..86400000]" }
  ])("rejects out-of-range config: $message", ({ env, message }) => {
    expect(() => loadRuntimeConfigFromEnv(env)).toThrow(message);
  });
});

describe("resolvePipelineConfig", () => {
  it("normalizes the archive prefix", () => {
    expect(resolvePipelineConfig({ archivePrefix: " /nightly/ " }).archivePrefix).toBe("nightly");
    expect(resolvePipelineConfig({ archivePrefix: "/" }).archivePrefix).toBeUndefined();
  });

  it("rejects marker names containing a path separator", () => {
    expect(() => resolvePipelineConfig({ markerFileName: "../done" })).toThrow(
      "markerFileName must be a plain file name. Received: ../done"
    );
  });
});
