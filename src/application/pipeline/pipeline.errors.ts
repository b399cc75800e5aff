import type { PipelineFailureCode, PipelineOutcome, PipelineStage } from "../../core/pipeline/PipelineRun";

export type UploadFailureKind = "partial" | "total";

export type FailedUpload = {
  path: string;
  reason: string;
};

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export class CrawlFailureError extends Error {
  readonly code = "crawl_failed";
  readonly exitCode: number | null;
  readonly signal: string | null;

  constructor(args: { site: string; exitCode: number | null; signal: string | null }) {
    const status = args.signal != null ? `signal ${args.signal}` : `exit code ${String(args.exitCode)}`;
    super(`Crawl for ${args.site} failed with ${status}`);
    this.name = "CrawlFailureError";
    this.exitCode = args.exitCode;
    this.signal = args.signal;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CompletionTimeoutError extends Error {
  readonly code = "completion_timeout";
  readonly timeoutMs: number;

  constructor(args: { site: string; downloadDir: string; timeoutMs: number }) {
    super(`Completion marker for ${args.site} not found in ${args.downloadDir} after ${args.timeoutMs}ms`);
    this.name = "CompletionTimeoutError";
    this.timeoutMs = args.timeoutMs;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UploadError extends Error {
  readonly code: "upload_partial" | "upload_total";
  readonly kind: UploadFailureKind;
  readonly failed: FailedUpload[];
  readonly uploaded: string[];

  constructor(args: { namespace: string; failed: FailedUpload[]; uploaded: string[]; reason?: string }) {
    const kind: UploadFailureKind = args.uploaded.length > 0 ? "partial" : "total";
    const detail =
      args.reason ??
      `${args.failed.length} file(s) failed: ${args.failed.map((f) => f.path).join(", ")}`;
    super(`Upload to ${args.namespace} failed (${kind}): ${detail}`);
    this.name = "UploadError";
    this.kind = kind;
    this.code = kind === "partial" ? "upload_partial" : "upload_total";
    this.failed = args.failed;
    this.uploaded = args.uploaded;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const fallbackCodes: Record<PipelineStage, PipelineFailureCode> = {
  crawl: "crawl_failed",
  wait: "wait_failed",
  upload: "upload_failed"
};

/**
 * Turns whatever a stage threw into the failed outcome recorded for the site.
 */
export const classifyPipelineFailure = (stage: PipelineStage, reason: unknown): PipelineOutcome => {
  let code = fallbackCodes[stage];
  if (reason instanceof CompletionTimeoutError) code = reason.code;
  if (reason instanceof UploadError) code = reason.code;

  return {
    status: "failed",
    stage,
    code,
    message: toErrorMessage(reason)
  };
};
