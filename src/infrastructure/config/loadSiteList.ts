import fs from "fs/promises";
import path from "path";
import { parseSiteList, type SiteSpec } from "../../core/site/siteSpec";
import { ConfigError } from "../../shared/config/config.error";

/**
 * Reads the JSON site list once at start-up. Relative `download_dir` values
 * resolve against the directory holding the file.
 */
export const loadSiteList = async (configPath: string): Promise<SiteSpec[]> => {
  const absolute = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.readFile(absolute, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read site list ${absolute}: ${reason}`, { source: absolute });
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Site list ${absolute} is not valid JSON: ${reason}`, { source: absolute });
  }

  return parseSiteList(document, path.dirname(absolute));
};
