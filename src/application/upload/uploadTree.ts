import fs from "fs/promises";
import path from "path";
import type { UploadSummary } from "../../core/pipeline/PipelineRun";
import type { ArchiveStore } from "../../ports/ArchiveStore";
import { createLimiter } from "../../shared/concurrency/limiter";
import type { Logger } from "../../shared/logging/logger";
import { type FailedUpload, UploadError } from "../pipeline/pipeline.errors";

export type UploadTreeParams = {
  localDir: string;
  namespace: string;
  store: ArchiveStore;
  concurrency?: number;
  ignore?: readonly string[];
  logger?: Logger;
  site?: string;
};

const toErrorMessage = (reason: unknown): string => (reason instanceof Error ? reason.message : String(reason));

const normalizeNamespace = (namespace: string): string => {
  const normalized = namespace.trim().replace(/^\/+|\/+$/g, "");
  if (normalized === "") {
    throw new Error("namespace must not be empty");
  }
  return normalized;
};

/**
 * Lists regular files below `root` as POSIX paths relative to it, sorted so
 * repeated runs visit files in the same order. `ignore` names files directly
 * in `root` only.
 */
export const listFiles = async (root: string, ignore: ReadonlySet<string> = new Set()): Promise<string[]> => {
  const files: string[] = [];

  const walk = async (dir: string, prefix: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await walk(path.join(dir, entry.name), relative);
      } else if (entry.isFile() && !(prefix === "" && ignore.has(entry.name))) {
        files.push(relative);
      }
    }
  };

  await walk(root, "");
  return files.sort();
};

// Paths the store would file under one key; none of them is uploaded.
const findKeyCollisions = (store: ArchiveStore, namespace: string, files: readonly string[]): FailedUpload[] => {
  const byKey = new Map<string, string[]>();
  for (const relative of files) {
    const stored = store.storageKeyFor(`${namespace}/${relative}`);
    byKey.set(stored, [...(byKey.get(stored) ?? []), relative]);
  }

  return [...byKey.entries()].flatMap(([stored, paths]) =>
    paths.length > 1
      ? paths.map((relative) => ({
          path: relative,
          reason: `stored key ${stored} is shared by ${paths.join(", ")}`
        }))
      : []
  );
};

const directoryExists = async (dir: string): Promise<boolean> => {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
};

/**
 * Uploads every file below `localDir` to `namespace/<relative path>`.
 * A failing file does not stop the others; the call rejects with
 * `UploadError` listing every path that did not make it. Paths the store
 * would file under the same key are all reported as failed.
 */
export const uploadTree = async (params: UploadTreeParams): Promise<UploadSummary> => {
  const { localDir, store, concurrency = 4, ignore = [], logger, site } = params;
  const namespace = normalizeNamespace(params.namespace);

  if (!(await directoryExists(localDir))) {
    throw new UploadError({
      namespace,
      failed: [],
      uploaded: [],
      reason: `directory not found: ${localDir}`
    });
  }

  const listed = await listFiles(localDir, new Set(ignore));
  if (listed.length === 0) {
    logger?.warn("upload.empty_tree", { site, localDir, namespace });
  }

  const collisions = findKeyCollisions(store, namespace, listed);
  const colliding = new Set(collisions.map((c) => c.path));
  for (const collision of collisions) {
    logger?.warn("upload.file_failed", { site, path: collision.path, reason: collision.reason });
  }
  const files = listed.filter((relative) => !colliding.has(relative));

  const limiter = createLimiter(concurrency);
  const results = await Promise.allSettled(
    files.map((relative) =>
      limiter.run(async () => {
        const body = await fs.readFile(path.join(localDir, ...relative.split("/")));
        const key = `${namespace}/${relative}`;
        await store.put(key, body);
        return { key, bytes: body.byteLength };
      })
    )
  );

  const uploaded: string[] = [];
  const failed: FailedUpload[] = [...collisions];
  let bytes = 0;
  results.forEach((result, index) => {
    const relative = files[index] ?? "";
    if (result.status === "fulfilled") {
      uploaded.push(result.value.key);
      bytes += result.value.bytes;
      return;
    }
    failed.push({ path: relative, reason: toErrorMessage(result.reason) });
    logger?.warn("upload.file_failed", { site, path: relative, reason: toErrorMessage(result.reason) });
  });

  if (failed.length > 0) {
    throw new UploadError({ namespace, failed, uploaded });
  }

  return { namespace, uploaded, fileCount: uploaded.length, bytes };
};
