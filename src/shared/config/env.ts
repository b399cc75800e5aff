import { ConfigError } from "./config.error";

export type Env = {
  SUPABASE_URL: string;
  SUPABASE_KEY: string;
  ARCHIVE_BUCKET: string;
  ARCHIVE_PREFIX?: string;
  NOTIFY_EMAIL?: string;
  BACKUP_LOG_FILE?: string;
  WGET_BIN: string;
  WGET_LOG_DIR?: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigError(`${name} must be a valid absolute http/https URL. Received: ${value}`, { field: name });
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(`${name} must use http or https scheme. Received: ${value}`, { field: name });
  }

  return value;
};

const requireValue = (env: NodeJS.ProcessEnv, name: string): string => {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigError(`${name} is required`, { field: name });
  }
  return value;
};

const optionalValue = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value ? value : undefined;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => ({
  SUPABASE_URL: validateHttpUrl("SUPABASE_URL", requireValue(env, "SUPABASE_URL")),
  SUPABASE_KEY: requireValue(env, "SUPABASE_KEY"),
  ARCHIVE_BUCKET: optionalValue(env, "ARCHIVE_BUCKET") ?? "website-backups",
  ARCHIVE_PREFIX: optionalValue(env, "ARCHIVE_PREFIX"),
  NOTIFY_EMAIL: optionalValue(env, "NOTIFY_EMAIL"),
  BACKUP_LOG_FILE: optionalValue(env, "BACKUP_LOG_FILE"),
  WGET_BIN: optionalValue(env, "WGET_BIN") ?? "wget",
  WGET_LOG_DIR: optionalValue(env, "WGET_LOG_DIR")
});
