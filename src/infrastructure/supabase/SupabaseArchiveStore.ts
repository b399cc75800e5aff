import path from "path";
import type { ArchiveStore, PutObjectOptions } from "../../ports/ArchiveStore";
import { ConfigError } from "../../shared/config/config.error";

/**
 * The slice of a Supabase `StorageFileApi` (`client.storage.from(bucket)`)
 * this store needs.
 */
export interface StorageBucket {
  upload(
    objectPath: string,
    body: Buffer,
    options: { upsert: boolean; contentType?: string }
  ): Promise<{ error: { message: string } | null }>;
  list(prefix: string, options: { limit: number }): Promise<{ error: { message: string } | null }>;
}

const describeAccessError = (bucketName: string, message: string): ConfigError => {
  if (/not found/i.test(message)) {
    return new ConfigError(`Storage bucket ${bucketName} not found: ${message}`, { field: "ARCHIVE_BUCKET" });
  }
  if (/jwt|signature|api ?key|unauthori[sz]ed/i.test(message)) {
    return new ConfigError(`Storage rejected SUPABASE_KEY: ${message}`, { field: "SUPABASE_KEY" });
  }
  if (/denied|forbidden|permission|row-level security/i.test(message)) {
    return new ConfigError(`Access to storage bucket ${bucketName} denied: ${message}`, { field: "SUPABASE_KEY" });
  }
  return new ConfigError(`Cannot access storage bucket ${bucketName}: ${message}`, { field: "ARCHIVE_BUCKET" });
};

const contentTypes: Record<string, string> = {
  ".html": "text/html",
  ".htm": "text/html",
  ".css": "text/css",
  ".js": "application/javascript",
  ".json": "application/json",
  ".xml": "application/xml",
  ".txt": "text/plain",
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".ico": "image/x-icon",
  ".pdf": "application/pdf",
  ".woff": "font/woff",
  ".woff2": "font/woff2"
};

export const contentTypeFor = (key: string): string =>
  contentTypes[path.posix.extname(key).toLowerCase()] ?? "application/octet-stream";

// Characters Storage accepts in a key, minus "@", which starts an escape.
const SAFE_KEY_CHAR = /^[\w/!\-.*'() &$=;:+,?]$/;

const escapeChar = (char: string): string =>
  SAFE_KEY_CHAR.test(char)
    ? char
    : [...Buffer.from(char, "utf8")].map((byte) => `@${byte.toString(16).toUpperCase().padStart(2, "0")}`).join("");

/**
 * Maps a relative path to a key Storage accepts. Every character outside the
 * accepted set (and "@" itself) becomes "@XX" per UTF-8 byte, so distinct
 * paths always get distinct keys: `más.html` is stored as `m@C3@A1s.html`.
 */
export const toStorageKey = (key: string): string =>
  key
    .split("/")
    .filter((segment) => segment !== "")
    .map((segment) => Array.from(segment, escapeChar).join(""))
    .join("/");

export class SupabaseArchiveStore implements ArchiveStore {
  constructor(
    private readonly bucket: StorageBucket,
    private readonly bucketName: string
  ) {}

  /**
   * Lists at most one object so bad credentials or a missing bucket surface
   * as a `ConfigError` before any crawl starts.
   */
  async verifyAccess(): Promise<void> {
    let result: { error: { message: string } | null };
    try {
      result = await this.bucket.list("", { limit: 1 });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Cannot reach storage for bucket ${this.bucketName}: ${reason}`, { field: "SUPABASE_URL" });
    }
    if (result.error) {
      throw describeAccessError(this.bucketName, result.error.message);
    }
  }

  storageKeyFor(key: string): string {
    return toStorageKey(key);
  }

  async put(key: string, body: Buffer, options: PutObjectOptions = {}): Promise<void> {
    const objectPath = toStorageKey(key);
    const { error } = await this.bucket.upload(objectPath, body, {
      upsert: true,
      contentType: options.contentType ?? contentTypeFor(objectPath)
    });
    if (error) {
      throw new Error(`Storage upload to ${this.bucketName}/${objectPath} failed: ${error.message}`);
    }
  }
}
