import type { SiteSpec } from "../site/siteSpec";

export type PipelineStage = "crawl" | "wait" | "upload";

// "pipeline" marks a runner that rejected without recording which stage it was in.
export type FailedStage = PipelineStage | "pipeline";

export type PipelineState =
  | "pending"
  | "crawling"
  | "awaiting_completion"
  | "uploading"
  | "succeeded"
  | "failed";

export type StageStatus = "pending" | "succeeded" | "failed" | "skipped";

export type PipelineFailureCode =
  | "crawl_failed"
  | "completion_timeout"
  | "wait_failed"
  | "upload_partial"
  | "upload_total"
  | "upload_failed"
  | "pipeline_crashed";

export type PipelineOutcome =
  | { status: "succeeded" }
  | {
      status: "failed";
      stage: FailedStage;
      code: PipelineFailureCode;
      message: string;
    };

export type UploadSummary = {
  namespace: string;
  uploaded: string[];
  fileCount: number;
  bytes: number;
};

export type PipelineRun = {
  site: SiteSpec;
  state: PipelineState;
  crawlStatus: StageStatus;
  waitStatus: StageStatus;
  uploadStatus: StageStatus;
  outcome: PipelineOutcome;
  upload?: UploadSummary;
  startedAt: Date;
  finishedAt: Date;
};

export const formatOutcome = (outcome: PipelineOutcome): string => {
  if (outcome.status === "succeeded") return "Succeeded";
  return outcome.code === "pipeline_crashed" ? "Failed(crashed)" : `Failed(${outcome.stage})`;
};
