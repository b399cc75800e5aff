import fs from "fs/promises";
import path from "path";
import type { Logger } from "../../shared/logging/logger";
import { COMPLETION_MARKER_FILE } from "../pipeline/pipeline.config";

export type CompletionMarker = Record<string, unknown>;

export type CompletionResult =
  | { status: "completed"; elapsedMs: number; marker?: CompletionMarker }
  | { status: "timed_out"; elapsedMs: number };

export type AwaitCompletionParams = {
  downloadDir: string;
  timeoutMs: number;
  pollIntervalMs: number;
  markerFileName?: string;
  site?: string;
  logger?: Logger;
  statusEveryMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

type MarkerProbe = { present: false } | { present: true; marker?: CompletionMarker };

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isMissingFile = (err: unknown): boolean => isRecord(err) && err.code === "ENOENT";

const parseMarker = (content: string): CompletionMarker | undefined => {
  try {
    const parsed: unknown = JSON.parse(content);
    if (isRecord(parsed)) return parsed;
  } catch {
    // an empty or free-form marker still counts as present
  }
  return undefined;
};

const probeMarker = async (markerPath: string): Promise<MarkerProbe> => {
  let content: string;
  try {
    content = await fs.readFile(markerPath, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return { present: false };
    throw err;
  }
  const marker = parseMarker(content);
  return marker ? { present: true, marker } : { present: true };
};

const assertTiming = (timeoutMs: number, pollIntervalMs: number) => {
  if (!Number.isInteger(timeoutMs) || timeoutMs < 0) {
    throw new Error(`timeoutMs must be an integer >= 0. Received: ${String(timeoutMs)}`);
  }
  if (!Number.isInteger(pollIntervalMs) || pollIntervalMs < 1) {
    throw new Error(`pollIntervalMs must be an integer >= 1. Received: ${String(pollIntervalMs)}`);
  }
};

/**
 * Polls `downloadDir` for the completion marker until it shows up or
 * `timeoutMs` runs out. The marker is only read, never removed.
 */
export const awaitCompletion = async (params: AwaitCompletionParams): Promise<CompletionResult> => {
  const {
    downloadDir,
    timeoutMs,
    pollIntervalMs,
    markerFileName = COMPLETION_MARKER_FILE,
    site,
    logger,
    statusEveryMs = 30_000,
    now = Date.now,
    sleep: sleepFn = sleep
  } = params;
  assertTiming(timeoutMs, pollIntervalMs);

  const markerPath = path.join(downloadDir, markerFileName);
  const startedAt = now();
  const deadline = startedAt + timeoutMs;
  let lastStatusAt = startedAt;

  while (true) {
    const probe = await probeMarker(markerPath);
    const current = now();
    if (probe.present) {
      return probe.marker
        ? { status: "completed", elapsedMs: current - startedAt, marker: probe.marker }
        : { status: "completed", elapsedMs: current - startedAt };
    }

    const remaining = deadline - current;
    if (remaining <= 0) {
      return { status: "timed_out", elapsedMs: current - startedAt };
    }

    if (current - lastStatusAt >= statusEveryMs) {
      logger?.info("wait.still_waiting", { site, elapsedMs: current - startedAt, timeoutMs });
      lastStatusAt = current;
    }

    await sleepFn(Math.min(pollIntervalMs, remaining));
  }
};
