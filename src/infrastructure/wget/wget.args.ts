import type { CrawlRequest } from "../../ports/Crawler";

/**
 * wget exits with 8 when the server answered some requests with an error.
 * A recursive mirror of a live site almost always hits a few of those.
 */
export const WGET_SUCCESS_EXIT_CODES: ReadonlySet<number> = new Set([0, 8]);

export type WgetArgsOptions = {
  logFile?: string;
};

export const buildWgetArgs = (request: CrawlRequest, opts: WgetArgsOptions = {}): string[] => {
  const args = [
    "-e",
    "robots=off",
    "--timeout=60",
    "--waitretry=30",
    "--tries=5",
    "--limit-rate=100k",
    "--recursive",
    "--level=15",
    "--no-parent",
    // assets served from other hosts (CDNs) land beside the main site
    "--span-hosts",
    "--page-requisites",
    "--adjust-extension",
    "--convert-links",
    `--directory-prefix=${request.downloadDir}`,
    "--cut-dirs=0",
    "--no-verbose"
  ];

  if (request.forceRedownload) {
    args.push("--no-timestamping", "--force-directories");
  } else {
    args.push("--continue", "--timestamping");
  }

  if (opts.logFile) {
    args.push(`--append-output=${opts.logFile}`);
  }

  args.push(request.url);
  return args;
};
