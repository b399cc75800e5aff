import { ConfigError } from "../../shared/config/config.error";

export type PipelineConfig = {
  waitTimeoutMs: number;
  pollIntervalMs: number;
  uploadConcurrency: number;
  markerFileName: string;
  archivePrefix?: string;
};

export type PipelineConfigInput = Partial<PipelineConfig>;

export const COMPLETION_MARKER_FILE = ".backup_complete";

export const defaultPipelineConfig: PipelineConfig = {
  waitTimeoutMs: 600_000,
  pollIntervalMs: 5_000,
  uploadConcurrency: 4,
  markerFileName: COMPLETION_MARKER_FILE
};

export const pipelineCaps = {
  waitTimeoutMs: { min: 0, max: 86_400_000 },
  pollIntervalMs: { min: 1, max: 600_000 },
  uploadConcurrency: { min: 1, max: 50 },
  pipelineConcurrency: { min: 1, max: 50 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validatePipelineConfig = (config: PipelineConfig): PipelineConfig => {
  assertIntegerInRange("waitTimeoutMs", config.waitTimeoutMs, pipelineCaps.waitTimeoutMs.min, pipelineCaps.waitTimeoutMs.max);
  assertIntegerInRange("pollIntervalMs", config.pollIntervalMs, pipelineCaps.pollIntervalMs.min, pipelineCaps.pollIntervalMs.max);
  assertIntegerInRange(
    "uploadConcurrency",
    config.uploadConcurrency,
    pipelineCaps.uploadConcurrency.min,
    pipelineCaps.uploadConcurrency.max
  );
  if (config.markerFileName.trim() === "" || /[\\/]/.test(config.markerFileName)) {
    throw new ConfigError(`markerFileName must be a plain file name. Received: ${config.markerFileName}`);
  }
  return config;
};

// "/backups/" and "backups" name the same prefix.
export const normalizeArchivePrefix = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim().replace(/^\/+|\/+$/g, "");
  return normalized === "" ? undefined : normalized;
};

export const resolvePipelineConfig = (input: PipelineConfigInput = {}): PipelineConfig =>
  validatePipelineConfig({
    ...defaultPipelineConfig,
    ...input,
    archivePrefix: normalizeArchivePrefix(input.archivePrefix)
  });

export const archiveNamespaceFor = (siteName: string, config: Pick<PipelineConfig, "archivePrefix">): string =>
  config.archivePrefix ? `${config.archivePrefix}/${siteName}` : siteName;
