import fs from "fs/promises";
import path from "path";
import type { PipelineRun, PipelineStage, PipelineState, StageStatus } from "../../core/pipeline/PipelineRun";
import { formatOutcome } from "../../core/pipeline/PipelineRun";
import type { SiteSpec } from "../../core/site/siteSpec";
import type { ArchiveStore } from "../../ports/ArchiveStore";
import type { Crawler } from "../../ports/Crawler";
import type { Logger } from "../../shared/logging/logger";
import { awaitCompletion } from "../completion/awaitCompletion";
import { uploadTree } from "../upload/uploadTree";
import type { PipelineConfig, PipelineConfigInput } from "./pipeline.config";
import { archiveNamespaceFor, resolvePipelineConfig } from "./pipeline.config";
import { classifyPipelineFailure, CompletionTimeoutError, CrawlFailureError } from "./pipeline.errors";

export type PipelineStages = {
  awaitCompletion: typeof awaitCompletion;
  uploadTree: typeof uploadTree;
};

export type PipelineDeps = {
  crawler: Crawler;
  store: ArchiveStore;
  logger: Logger;
  config?: PipelineConfigInput;
  stages?: Partial<PipelineStages>;
  now?: () => Date;
};

const statusKeys: Record<PipelineStage, "crawlStatus" | "waitStatus" | "uploadStatus"> = {
  crawl: "crawlStatus",
  wait: "waitStatus",
  upload: "uploadStatus"
};

const stageOrder: PipelineStage[] = ["crawl", "wait", "upload"];

/**
 * Runs crawl -> wait for marker -> upload for one site. Each stage only starts
 * once the previous one succeeded. Never rejects: every failure ends up in the
 * returned run's `outcome`.
 */
export const runSitePipeline = async (site: SiteSpec, deps: PipelineDeps): Promise<PipelineRun> => {
  const { crawler, store, logger, now = () => new Date() } = deps;
  const stages: PipelineStages = {
    awaitCompletion: deps.stages?.awaitCompletion ?? awaitCompletion,
    uploadTree: deps.stages?.uploadTree ?? uploadTree
  };

  const startedAt = now();
  const run: PipelineRun = {
    site,
    state: "pending",
    crawlStatus: "pending",
    waitStatus: "pending",
    uploadStatus: "pending",
    outcome: { status: "succeeded" },
    startedAt,
    finishedAt: startedAt
  };

  const transition = (to: PipelineState) => {
    logger.info("pipeline.stage_transition", { site: site.name, from: run.state, to });
    run.state = to;
  };

  const setStage = (stage: PipelineStage, status: StageStatus) => {
    run[statusKeys[stage]] = status;
  };

  const fail = (stage: PipelineStage, reason: unknown): PipelineRun => {
    setStage(stage, "failed");
    for (const later of stageOrder.slice(stageOrder.indexOf(stage) + 1)) {
      setStage(later, "skipped");
    }
    run.outcome = classifyPipelineFailure(stage, reason);
    transition("failed");
    return finish();
  };

  const finish = (): PipelineRun => {
    run.finishedAt = now();
    const fields = {
      site: site.name,
      result: formatOutcome(run.outcome),
      durationMs: run.finishedAt.getTime() - run.startedAt.getTime()
    };
    if (run.outcome.status === "failed") {
      logger.error("pipeline.result", { ...fields, code: run.outcome.code, message: run.outcome.message });
    } else {
      logger.info("pipeline.result", { ...fields, files: run.upload?.fileCount ?? 0 });
    }
    return run;
  };

  logger.info("pipeline.started", { site: site.name, url: site.url, downloadDir: site.downloadDir });

  let config: PipelineConfig;
  try {
    config = resolvePipelineConfig(deps.config);
  } catch (err) {
    return fail("crawl", err);
  }

  transition("crawling");
  try {
    await fs.mkdir(site.downloadDir, { recursive: true });
    // A marker left by the previous run would end the wait before this crawl finishes.
    await fs.rm(path.join(site.downloadDir, config.markerFileName), { force: true });

    const result = await crawler.crawl({
      site: site.name,
      url: site.url,
      downloadDir: site.downloadDir,
      forceRedownload: site.forceRedownload
    });
    if (!result.ok) {
      throw new CrawlFailureError({ site: site.name, exitCode: result.exitCode, signal: result.signal });
    }
  } catch (err) {
    return fail("crawl", err);
  }
  setStage("crawl", "succeeded");

  transition("awaiting_completion");
  try {
    const completion = await stages.awaitCompletion({
      downloadDir: site.downloadDir,
      timeoutMs: config.waitTimeoutMs,
      pollIntervalMs: config.pollIntervalMs,
      markerFileName: config.markerFileName,
      site: site.name,
      logger
    });
    if (completion.status === "timed_out") {
      throw new CompletionTimeoutError({
        site: site.name,
        downloadDir: site.downloadDir,
        timeoutMs: config.waitTimeoutMs
      });
    }
  } catch (err) {
    return fail("wait", err);
  }
  setStage("wait", "succeeded");

  transition("uploading");
  try {
    run.upload = await stages.uploadTree({
      localDir: site.downloadDir,
      namespace: archiveNamespaceFor(site.name, config),
      store,
      concurrency: config.uploadConcurrency,
      ignore: [config.markerFileName],
      logger,
      site: site.name
    });
  } catch (err) {
    return fail("upload", err);
  }
  setStage("upload", "succeeded");

  transition("succeeded");
  return finish();
};
