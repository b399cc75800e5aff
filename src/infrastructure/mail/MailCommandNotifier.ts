import type { Notification, Notifier } from "../../ports/Notifier";
import { type ProcessRunner, runProcess } from "../../shared/process/runProcess";

/**
 * Sends the notification through the host's `mail` command. The body goes to
 * the command's stdin.
 */
export class MailCommandNotifier implements Notifier {
  constructor(
    private readonly recipient: string,
    private readonly mailBin = "mail",
    private readonly run: ProcessRunner = runProcess
  ) {}

  async notify(notification: Notification): Promise<void> {
    const { exitCode, signal } = await this.run(this.mailBin, ["-s", notification.subject, this.recipient], {
      input: notification.body
    });
    if (exitCode !== 0) {
      const status = signal != null ? `signal ${signal}` : `exit code ${String(exitCode)}`;
      throw new Error(`${this.mailBin} failed with ${status} while notifying ${this.recipient}`);
    }
  }
}
