import {
  defaultPipelineConfig,
  pipelineCaps,
  type PipelineConfig,
  validatePipelineConfig
} from "../../application/pipeline/pipeline.config";
import { ConfigError } from "./config.error";

export type RuntimeConfig = {
  pipelineConfig: PipelineConfig;
  maxConcurrency?: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new ConfigError(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`, { field: name });
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const pipelineConfig = validatePipelineConfig({
    ...defaultPipelineConfig,
    waitTimeoutMs:
      parseOptionalIntInRange(env, "WAIT_TIMEOUT_MS", pipelineCaps.waitTimeoutMs) ?? defaultPipelineConfig.waitTimeoutMs,
    pollIntervalMs:
      parseOptionalIntInRange(env, "WAIT_POLL_INTERVAL_MS", pipelineCaps.pollIntervalMs) ??
      defaultPipelineConfig.pollIntervalMs,
    uploadConcurrency:
      parseOptionalIntInRange(env, "UPLOAD_CONCURRENCY", pipelineCaps.uploadConcurrency) ??
      defaultPipelineConfig.uploadConcurrency
  });

  const maxConcurrency = parseOptionalIntInRange(env, "PIPELINE_CONCURRENCY", pipelineCaps.pipelineConcurrency);

  return maxConcurrency != null ? { pipelineConfig, maxConcurrency } : { pipelineConfig };
};
