import fs from "fs/promises";
import path from "path";
import { COMPLETION_MARKER_FILE } from "../../application/pipeline/pipeline.config";
import type { Crawler, CrawlRequest, CrawlResult } from "../../ports/Crawler";
import type { Logger } from "../../shared/logging/logger";
import { type ProcessRunner, runProcess } from "../../shared/process/runProcess";
import { buildWgetArgs, WGET_SUCCESS_EXIT_CODES } from "./wget.args";

export type WgetCrawlerOptions = {
  wgetBin?: string;
  logDir?: string;
  markerFileName?: string;
  logger?: Logger;
  run?: ProcessRunner;
  now?: () => Date;
};

/**
 * Mirrors a site with wget. Once wget is done the crawler writes the
 * completion marker into the download directory; nothing else does.
 */
export class WgetCrawler implements Crawler {
  private readonly wgetBin: string;
  private readonly markerFileName: string;
  private readonly run: ProcessRunner;
  private readonly now: () => Date;

  constructor(private readonly opts: WgetCrawlerOptions = {}) {
    this.wgetBin = opts.wgetBin ?? "wget";
    this.markerFileName = opts.markerFileName ?? COMPLETION_MARKER_FILE;
    this.run = opts.run ?? runProcess;
    this.now = opts.now ?? (() => new Date());
  }

  async crawl(request: CrawlRequest): Promise<CrawlResult> {
    let logFile: string | undefined;
    if (this.opts.logDir) {
      await fs.mkdir(this.opts.logDir, { recursive: true });
      logFile = path.join(this.opts.logDir, `${request.site}.wget.log`);
    }

    const args = buildWgetArgs(request, { logFile });
    this.opts.logger?.info("crawl.started", {
      site: request.site,
      url: request.url,
      forceRedownload: request.forceRedownload
    });

    const { exitCode, signal } = await this.run(this.wgetBin, args);
    const ok = signal == null && exitCode != null && WGET_SUCCESS_EXIT_CODES.has(exitCode);

    if (!ok) {
      this.opts.logger?.error("crawl.failed", { site: request.site, exitCode, signal });
      return { ok, exitCode, signal };
    }

    if (exitCode !== 0) {
      this.opts.logger?.warn("crawl.server_errors", { site: request.site, exitCode });
    }
    await this.writeMarker(request, exitCode);
    this.opts.logger?.info("crawl.completed", { site: request.site, exitCode });
    return { ok, exitCode, signal };
  }

  private async writeMarker(request: CrawlRequest, exitCode: number | null): Promise<void> {
    const marker = {
      site: request.site,
      url: request.url,
      exitCode,
      finishedAt: this.now().toISOString()
    };
    await fs.writeFile(path.join(request.downloadDir, this.markerFileName), `${JSON.stringify(marker)}\n`);
  }
}
