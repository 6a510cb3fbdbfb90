import type { Logger } from "pino";
import type { AlertNotifierPort, CriticalAlert } from "../../ports/alert-notifier.js";

/** Used when no chat webhook is configured: alerts only reach the log. */
export class LoggingAlertNotifier implements AlertNotifierPort {
  constructor(private readonly logger: Logger) {}

  async sendCriticalAlert(alert: CriticalAlert): Promise<void> {
    this.logger.error({ title: alert.title, platform: alert.platform }, alert.message);
  }
}
