import fs from "fs/promises";
import path from "path";
import { formatSummaryLines } from "../../src/application/orchestrator/report";
import { runAll } from "../../src/application/orchestrator/runAll";
import type { PipelineRun } from "../../src/core/pipeline/PipelineRun";
import type { SiteSpec } from "../../src/core/site/siteSpec";
import { ConfigError } from "../../src/shared/config/config.error";
import { createCapturingLogger, createFakeCrawler, createInMemoryArchiveStore, makeTempDir } from "../support/fakes";

const fastConfig = { waitTimeoutMs: 300, pollIntervalMs: 20 };

describe("runAll", () => {
  let root: string;

  const siteFor = (name: string): SiteSpec => ({
    name,
    url: `https://${name}.example.org/`,
    downloadDir: path.join(root, name),
    forceRedownload: false
  });

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("reports a failed crawl on one site without affecting the other", async () => {
    const { crawler } = createFakeCrawler({
      files: { "index.html": "home" },
      results: { a: { ok: false, exitCode: 4, signal: null } }
    });
    const { store, objects } = createInMemoryArchiveStore();
    const { logger } = createCapturingLogger();

    const report = await runAll([siteFor("a"), siteFor("b")], { crawler, store, logger, config: fastConfig });

    expect(report.statuses).toEqual({
      a: {
        status: "failed",
        stage: "crawl",
        code: "crawl_failed",
        message: "Crawl for a failed with exit code 4"
      },
      b: { status: "succeeded" }
    });
    expect(report.succeeded).toBe(1);
    expect(report.failed).toBe(1);
    expect([...objects.keys()]).toEqual(["b/index.html"]);
  });

  it("returns exactly one entry per site in input order regardless of failures", async () => {
    const names = ["s1", "s2", "s3", "s4", "s5"];
    const { crawler } = createFakeCrawler({
      results: {
        s2: { ok: false, exitCode: 1, signal: null },
        s4: { ok: false, exitCode: null, signal: "SIGKILL" }
      }
    });
    const { store } = createInMemoryArchiveStore();
    const { logger } = createCapturingLogger();

    const report = await runAll(names.map(siteFor), { crawler, store, logger, config: fastConfig });

    expect(report.runs.map((r) => r.site.name)).toEqual(names);
    expect(Object.keys(report.statuses)).toHaveLength(5);
    expect(report.statuses.s4).toMatchObject({ message: "Crawl for s4 failed with signal SIGKILL" });
    expect(report.failed).toBe(2);
  });

  it("runs all pipelines concurrently by default", async () => {
    let active = 0;
    let maxActive = 0;
    const runPipeline = async (site: SiteSpec): Promise<PipelineRun> => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((r) => setTimeout(r, 30));
      active -= 1;
      const at = new Date();
      return {
        site,
        state: "succeeded",
        crawlStatus: "succeeded",
        waitStatus: "succeeded",
        uploadStatus: "succeeded",
        outcome: { status: "succeeded" },
        startedAt: at,
        finishedAt: at
      };
    };
    const { crawler } = createFakeCrawler();
    const { store } = createInMemoryArchiveStore();
    const { logger } = createCapturingLogger();

    await runAll(["a", "b", "c", "d"].map(siteFor), { crawler, store, logger, runPipeline });
    expect(maxActive).toBe(4);

    maxActive = 0;
    await runAll(["a", "b", "c", "d"].map(siteFor), { crawler, store, logger, runPipeline, maxConcurrency: 2 });
    expect(maxActive).toBe(2);
  });

  it("still collects every result when a runner rejects", async () => {
    const runPipeline = jest.fn(async (site: SiteSpec): Promise<PipelineRun> => {
      if (site.name === "a") throw new Error("logger exploded");
      const at = new Date();
      return {
        site,
        state: "succeeded",
        crawlStatus: "succeeded",
        waitStatus: "succeeded",
        uploadStatus: "succeeded",
        outcome: { status: "succeeded" },
        startedAt: at,
        finishedAt: at
      };
    });
    const { crawler } = createFakeCrawler();
    const { store } = createInMemoryArchiveStore();
    const { logger } = createCapturingLogger();

    const report = await runAll([siteFor("a"), siteFor("b")], { crawler, store, logger, runPipeline });

    expect(report.statuses.a).toEqual({
      status: "failed",
      stage: "pipeline",
      code: "pipeline_crashed",
      message: "logger exploded"
    });
    expect(report.runs[0]).toMatchObject({ crawlStatus: "pending", waitStatus: "pending", uploadStatus: "pending" });
    expect(report.statuses.b).toEqual({ status: "succeeded" });
    expect(formatSummaryLines(report)).toEqual(["a: Failed(crashed)", "b: Succeeded"]);
  });

  it("refuses nested download directories before starting anything", async () => {
    const { crawler, requests } = createFakeCrawler();
    const { store } = createInMemoryArchiveStore();
    const { logger } = createCapturingLogger();
    const nested = { ...siteFor("b"), downloadDir: path.join(siteFor("a").downloadDir, "b") };

    await expect(runAll([siteFor("a"), nested], { crawler, store, logger })).rejects.toBeInstanceOf(ConfigError);
    expect(requests).toHaveLength(0);
  });

  it("refuses two sites sharing a download directory before starting anything", async () => {
    const { crawler, requests } = createFakeCrawler();
    const { store } = createInMemoryArchiveStore();
    const { logger, entries } = createCapturingLogger();
    const shared = { ...siteFor("b"), downloadDir: siteFor("a").downloadDir };

    await expect(runAll([siteFor("a"), shared], { crawler, store, logger })).rejects.toBeInstanceOf(ConfigError);
    expect(requests).toHaveLength(0);
    expect(entries).toHaveLength(0);
  });

  it("logs the start and the completion of the run", async () => {
    const { crawler } = createFakeCrawler();
    const { store } = createInMemoryArchiveStore();
    const { logger, entries } = createCapturingLogger();

    await runAll([siteFor("a")], { crawler, store, logger, config: fastConfig });

    expect(entries[0]).toMatchObject({ event: "backup.started", sites: ["a"], concurrency: 1 });
    expect(entries[entries.length - 1]).toMatchObject({ event: "backup.completed", succeeded: 1, failed: 0 });
  });
});
