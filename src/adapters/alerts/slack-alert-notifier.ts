import type { Logger } from "pino";
import type { ClockPort } from "../../infra/clock.js";
import type { AlertNotifierPort, CriticalAlert } from "../../ports/alert-notifier.js";
import type { HttpClientPort } from "../../ports/http-client.js";

interface SlackAlertNotifierOptions {
  webhookUrl: string;
  environment: string;
  timeoutMs?: number;
}

export function buildSlackAlertPayload(alert: CriticalAlert, environment: string, timestamp: string) {
  return {
    attachments: [
      {
        color: "#E01E5A",
        blocks: [
          {
            type: "header",
            text: { type: "plain_text", text: `🚨  ${alert.title}`, emoji: true },
          },
          {
            type: "section",
            text: { type: "mrkdwn", text: alert.message },
          },
          {
            type: "section",
            fields: [
              { type: "mrkdwn", text: "*Severity:*\nCRITICAL" },
              { type: "mrkdwn", text: `*Environment:*\n${environment}` },
              { type: "mrkdwn", text: `*Platform:*\n${alert.platform ?? "general"}` },
              { type: "mrkdwn", text: `*Timestamp:*\n${timestamp}` },
            ],
          },
        ],
      },
    ],
  };
}

export class SlackAlertNotifier implements AlertNotifierPort {
  constructor(
    private readonly http: HttpClientPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly options: SlackAlertNotifierOptions,
  ) {}

  async sendCriticalAlert(alert: CriticalAlert): Promise<void> {
    try {
      const response = await this.http.request({
        method: "POST",
        url: this.options.webhookUrl,
        json: buildSlackAlertPayload(alert, this.options.environment, this.clock.nowIso()),
        timeoutMs: this.options.timeoutMs ?? 5000,
      });
      if (response.status >= 400) {
        this.logger.warn({ status: response.status, title: alert.title }, "Slack webhook returned non-OK status");
        return;
      }
      this.logger.info({ title: alert.title }, "critical alert sent");
    } catch (error) {
      this.logger.warn({ err: error, title: alert.title }, "failed to send Slack alert");
    }
  }
}
