export type CrawlRequest = {
  site: string;
  url: string;
  downloadDir: string;
  forceRedownload: boolean;
};

export type CrawlResult = {
  ok: boolean;
  exitCode: number | null;
  signal: string | null;
};

/**
 * Populates `downloadDir` and, once every fetch pass has finished, leaves the
 * completion marker behind. Rejects only when the crawl could not be started.
 */
export interface Crawler {
  crawl(request: CrawlRequest): Promise<CrawlResult>;
}
