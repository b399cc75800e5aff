import { createClient } from "@supabase/supabase-js";
import { type BackupRunReport, runAll } from "../application/orchestrator/runAll";
import { buildRunNotification } from "../application/orchestrator/report";
import { loadSiteList } from "../infrastructure/config/loadSiteList";
import { MailCommandNotifier } from "../infrastructure/mail/MailCommandNotifier";
import { SupabaseArchiveStore } from "../infrastructure/supabase/SupabaseArchiveStore";
import { WgetCrawler } from "../infrastructure/wget/WgetCrawler";
import type { Notifier } from "../ports/Notifier";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import { createLogger, type Logger } from "../shared/logging/logger";

const sendNotification = async (notifier: Notifier, report: BackupRunReport, logger: Logger): Promise<void> => {
  const notification = buildRunNotification(report);
  try {
    await notifier.notify(notification);
    logger.info("notify.sent", { subject: notification.subject });
  } catch (err) {
    // notification failures never change the run outcome
    logger.error("notify.failed", { subject: notification.subject, error: err });
  }
};

/**
 * Loads and validates all configuration and checks access to the storage
 * bucket before the first pipeline starts, then mails the run summary when
 * NOTIFY_EMAIL is set.
 */
export const runBackups = async (configPath: string): Promise<BackupRunReport> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const logger = createLogger({ logFile: env.BACKUP_LOG_FILE });

  const sites = await loadSiteList(configPath);
  const config = { ...runtime.pipelineConfig, archivePrefix: env.ARCHIVE_PREFIX };

  const supabase = createClient(env.SUPABASE_URL, env.SUPABASE_KEY, {
    auth: { persistSession: false }
  });
  const store = new SupabaseArchiveStore(supabase.storage.from(env.ARCHIVE_BUCKET), env.ARCHIVE_BUCKET);
  await store.verifyAccess();
  logger.info("storage.verified", { bucket: env.ARCHIVE_BUCKET });
  const crawler = new WgetCrawler({
    wgetBin: env.WGET_BIN,
    logDir: env.WGET_LOG_DIR,
    markerFileName: config.markerFileName,
    logger
  });

  const report = await runAll(sites, {
    crawler,
    store,
    logger,
    config,
    maxConcurrency: runtime.maxConcurrency
  });

  if (env.NOTIFY_EMAIL) {
    await sendNotification(new MailCommandNotifier(env.NOTIFY_EMAIL), report, logger);
  }

  return report;
};
