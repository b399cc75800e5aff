import { formatOutcome } from "../../core/pipeline/PipelineRun";
import type { Notification } from "../../ports/Notifier";
import type { BackupRunReport } from "./runAll";

export const formatSummaryLines = (report: BackupRunReport): string[] =>
  report.runs.map((run) => `${run.site.name}: ${formatOutcome(run.outcome)}`);

const formatDay = (date: Date): string => date.toISOString().slice(0, 10);

/**
 * Subject and body of the email sent after every run. Failed sites are
 * listed again with their failure code and message.
 */
export const buildRunNotification = (report: BackupRunReport): Notification => {
  const outcome = report.failed > 0 ? "Failed" : "Successful";
  const subject = `Website Backup ${outcome} - ${formatDay(report.startedAt)}`;

  const lines = [
    `${report.succeeded} of ${report.runs.length} site(s) backed up.`,
    "",
    ...formatSummaryLines(report)
  ];

  const failures = report.runs.flatMap((run) =>
    run.outcome.status === "failed" ? [`- ${run.site.name} [${run.outcome.code}]: ${run.outcome.message}`] : []
  );
  if (failures.length > 0) {
    lines.push("", "Errors:", ...failures);
  }

  return { subject, body: lines.join("\n") };
};
