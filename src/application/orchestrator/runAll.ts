import type { PipelineOutcome, PipelineRun } from "../../core/pipeline/PipelineRun";
import { assertDisjointSites, type SiteSpec } from "../../core/site/siteSpec";
import { createLimiter } from "../../shared/concurrency/limiter";
import { resolvePipelineConfig } from "../pipeline/pipeline.config";
import { type PipelineDeps, runSitePipeline } from "../pipeline/runSitePipeline";

export type BackupRunReport = {
  statuses: Record<string, PipelineOutcome>;
  runs: PipelineRun[];
  succeeded: number;
  failed: number;
  startedAt: Date;
  finishedAt: Date;
};

export type RunAllDeps = PipelineDeps & {
  maxConcurrency?: number;
  runPipeline?: typeof runSitePipeline;
};

// Pipelines report their own failures; this only covers a runner that rejected
// anyway. Its stage statuses were never reported, so they stay pending.
const crashedRun = (site: SiteSpec, reason: unknown, at: Date): PipelineRun => ({
  site,
  state: "failed",
  crawlStatus: "pending",
  waitStatus: "pending",
  uploadStatus: "pending",
  outcome: {
    status: "failed",
    stage: "pipeline",
    code: "pipeline_crashed",
    message: reason instanceof Error ? reason.message : String(reason)
  },
  startedAt: at,
  finishedAt: at
});

/**
 * Starts one pipeline per site and waits for every one of them to reach a
 * terminal state. Results come back in input order, one per site.
 */
export const runAll = async (sites: readonly SiteSpec[], deps: RunAllDeps): Promise<BackupRunReport> => {
  const { logger, maxConcurrency, runPipeline = runSitePipeline, now = () => new Date() } = deps;

  assertDisjointSites(sites);
  resolvePipelineConfig(deps.config);

  const startedAt = now();
  const limiter = createLimiter(maxConcurrency ?? Number.POSITIVE_INFINITY);
  logger.info("backup.started", {
    sites: sites.map((s) => s.name),
    concurrency: maxConcurrency ?? sites.length
  });

  const settled = await Promise.allSettled(sites.map((site) => limiter.run(() => runPipeline(site, deps))));
  const runs = settled.map((result, index) =>
    result.status === "fulfilled" ? result.value : crashedRun(sites[index], result.reason, now())
  );

  const statuses: Record<string, PipelineOutcome> = {};
  let succeeded = 0;
  for (const run of runs) {
    statuses[run.site.name] = run.outcome;
    if (run.outcome.status === "succeeded") succeeded += 1;
  }

  const report: BackupRunReport = {
    statuses,
    runs,
    succeeded,
    failed: runs.length - succeeded,
    startedAt,
    finishedAt: now()
  };
  logger.info("backup.completed", {
    succeeded: report.succeeded,
    failed: report.failed,
    durationMs: report.finishedAt.getTime() - startedAt.getTime()
  });
  return report;
};
