#!/usr/bin/env node
import minimist from "minimist";
import { formatSummaryLines } from "../application/orchestrator/report";
import { runBackups } from "../composition/root";

type ErrorContext = Partial<{
  index: number;
  field: string;
  source: string;
}>;

type CliErrorEnvelope = {
  event: "backup.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  stack?: string;
};

const USAGE = "Usage: website-backups <sites.json> | --config <sites.json>";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const context: ErrorContext = {};
  if (typeof value.index === "number" && Number.isFinite(value.index)) context.index = value.index;
  if (typeof value.field === "string") context.field = value.field;
  if (typeof value.source === "string") context.source = value.source;

  return Object.keys(context).length > 0 ? context : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "backup.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const parseCliArgs = (argv: string[]): { configPath?: string } => {
  const args = minimist(argv, { string: ["config"], alias: { c: "config" } });
  const positional = args._.length > 0 ? String(args._[0]) : undefined;
  const configPath = typeof args.config === "string" && args.config !== "" ? args.config : positional;
  return configPath ? { configPath } : {};
};

export const executeBackupCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  const { configPath } = parseCliArgs(argv);
  if (!configPath) {
    // eslint-disable-next-line no-console
    console.error(USAGE);
    process.exit(2);
  }

  let failed: number;
  try {
    const report = await runBackups(configPath);
    for (const line of formatSummaryLines(report)) {
      // eslint-disable-next-line no-console
      console.log(line);
    }
    failed = report.failed;
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }

  if (failed > 0) {
    process.exit(1);
  }
};

if (require.main === module) {
  void executeBackupCli();
}
