import path from "path";
import { ConfigError } from "../../shared/config/config.error";

export type SiteSpec = Readonly<{
  name: string;
  url: string;
  downloadDir: string;
  forceRedownload: boolean;
}>;

export type RawSiteEntry = Record<string, unknown>;

const SITE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const requireString = (entry: RawSiteEntry, field: string, index: number): string => {
  const value = entry[field];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`Site #${index}: missing required field "${field}"`, { index, field });
  }
  return value.trim();
};

const parseSiteName = (entry: RawSiteEntry, index: number): string => {
  const name = requireString(entry, "name", index);
  if (!SITE_NAME_PATTERN.test(name)) {
    throw new ConfigError(
      `Site #${index}: name "${name}" may only contain letters, digits, ".", "_" and "-"`,
      { index, field: "name" }
    );
  }
  return name;
};

const parseSiteUrl = (entry: RawSiteEntry, index: number): string => {
  const raw = requireString(entry, "url", index);
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new ConfigError(`Site #${index}: url must be a valid absolute http/https URL. Received: ${raw}`, {
      index,
      field: "url"
    });
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(`Site #${index}: url must use http or https scheme. Received: ${raw}`, {
      index,
      field: "url"
    });
  }
  return raw;
};

const parseForceRedownload = (entry: RawSiteEntry, index: number): boolean => {
  const value = entry.force_redownload;
  if (value == null) return false;
  if (typeof value !== "boolean") {
    throw new ConfigError(`Site #${index}: force_redownload must be a boolean`, {
      index,
      field: "force_redownload"
    });
  }
  return value;
};

export const parseSiteSpec = (raw: unknown, index: number, baseDir: string): SiteSpec => {
  if (!isRecord(raw)) {
    throw new ConfigError(`Site #${index}: entry must be an object`, { index });
  }

  return Object.freeze({
    name: parseSiteName(raw, index),
    url: parseSiteUrl(raw, index),
    downloadDir: path.resolve(baseDir, requireString(raw, "download_dir", index)),
    forceRedownload: parseForceRedownload(raw, index)
  });
};

const isSameOrInside = (dir: string, parent: string): boolean => {
  const relative = path.relative(parent, dir);
  const escapes = relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative);
  return !escapes;
};

/**
 * Site names must be unique, and no download directory may equal or contain
 * another site's download directory.
 */
export const assertDisjointSites = (sites: readonly SiteSpec[]): void => {
  const names = new Map<string, number>();

  sites.forEach((site, index) => {
    const sameName = names.get(site.name);
    if (sameName != null) {
      throw new ConfigError(`Site #${index}: name "${site.name}" is already used by site #${sameName}`, {
        index,
        field: "name"
      });
    }
    names.set(site.name, index);

    sites.slice(0, index).forEach((other, otherIndex) => {
      if (site.downloadDir === other.downloadDir) {
        throw new ConfigError(
          `Site #${index}: download_dir ${site.downloadDir} is already used by site #${otherIndex}`,
          { index, field: "download_dir" }
        );
      }
      if (isSameOrInside(site.downloadDir, other.downloadDir) || isSameOrInside(other.downloadDir, site.downloadDir)) {
        throw new ConfigError(
          `Site #${index}: download_dir ${site.downloadDir} overlaps download_dir ${other.downloadDir} of site #${otherIndex}`,
          { index, field: "download_dir" }
        );
      }
    });
  });
};

/**
 * Accepts either `{ "sites": [...] }` or a bare array of entries.
 * Relative download directories are resolved against `baseDir`.
 */
export const parseSiteList = (document: unknown, baseDir: string): SiteSpec[] => {
  const entries = isRecord(document) ? document.sites : document;
  if (!Array.isArray(entries)) {
    throw new ConfigError('Site list must be an array or an object with a "sites" array');
  }
  if (entries.length === 0) {
    throw new ConfigError("Site list is empty");
  }

  const sites = entries.map((entry: unknown, index) => parseSiteSpec(entry, index, baseDir));
  assertDisjointSites(sites);
  return sites;
};
