import type { Logger } from "pino";
import type { CreateWebhookEventInput, SkipReason, WebhookEventRecord } from "../domain/types.js";
import { readText } from "../domain/sale-response.js";
import { WebhookProcessingError, errorMessage } from "../infra/app-error.js";
import { isRecord } from "../infra/json.js";
import type { AlertNotifierPort } from "../ports/alert-notifier.js";
import type { IdempotencyCoordinator } from "./idempotency-coordinator.js";
import type { SettlementResult, SettlementService } from "./settlement-service.js";

export type IntakeResult<TResult> =
  | { outcome: "skipped"; reason: SkipReason; eventId: string }
  | { outcome: "executed" | "retried"; eventId: string; result: TResult };

export interface SettlementWebhookInput {
  eventId: string;
  eventType: string;
  payload: Record<string, unknown>;
}

export type SettlementWebhookResult =
  | { kind: "settled"; settlement: SettlementResult }
  | { kind: "recorded" };

export interface OrderPlacementInput {
  eventId: string;
  correlationId: string | null;
  payload: Record<string, unknown>;
}

export const SETTLE_OK_STATUS = "settle_ok";

export function settlementOrder(payload: Record<string, unknown>): { cartId: string | null; status: string | null } {
  const order = payload.order;
  if (!isRecord(order)) {
    return { cartId: null, status: null };
  }
  return { cartId: readText(order, "order_id"), status: readText(order, "status") };
}

export class WebhookIntakeService {
  constructor(
    private readonly coordinator: IdempotencyCoordinator,
    private readonly settlement: SettlementService,
    private readonly alerts: AlertNotifierPort,
    private readonly logger: Logger,
  ) {}

  /**
   * Runs `handler` at most once per successful delivery of `input.eventId`. A handler failure is
   * recorded on the row and alerted, then rethrown unchanged.
   */
  async runOnce<TResult>(
    input: CreateWebhookEventInput,
    handler: (event: WebhookEventRecord) => Promise<TResult>,
  ): Promise<IntakeResult<TResult>> {
    const admission = await this.coordinator.admit(input);
    if (admission.outcome === "skip") {
      return { outcome: "skipped", reason: admission.reason, eventId: admission.eventId };
    }

    const { event } = admission;
    let result: TResult;
    try {
      result = await handler(event);
    } catch (error) {
      await this.recordFailure(event, error);
      throw error;
    }

    await this.coordinator.finalize(event.id, { ok: true });
    return {
      outcome: admission.outcome === "execute" ? "executed" : "retried",
      eventId: event.event_id,
      result,
    };
  }

  async handleSettlementWebhook(input: SettlementWebhookInput): Promise<IntakeResult<SettlementWebhookResult>> {
    const { cartId, status } = settlementOrder(input.payload);
    return this.runOnce(
      {
        eventId: input.eventId,
        provider: "solidgate",
        eventType: input.eventType,
        correlationId: cartId,
        payload: input.payload,
      },
      async (): Promise<SettlementWebhookResult> => {
        if (status !== SETTLE_OK_STATUS) {
          this.logger.info({ eventId: input.eventId, status }, "settlement webhook recorded without action");
          return { kind: "recorded" };
        }
        if (!cartId) {
          throw new WebhookProcessingError("lookup_cart_payment", "Settlement webhook carries no order id");
        }
        return { kind: "settled", settlement: await this.settlement.settle(cartId) };
      },
    );
  }

  async recordOrderPlacement(input: OrderPlacementInput): Promise<IntakeResult<{ eventId: string }>> {
    return this.runOnce(
      {
        eventId: input.eventId,
        provider: "ordergroove",
        eventType: "recurring_order_placement",
        correlationId: input.correlationId,
        payload: input.payload,
      },
      async (event) => ({ eventId: event.event_id }),
    );
  }

  private async recordFailure(event: WebhookEventRecord, error: unknown): Promise<void> {
    const message = errorMessage(error);
    const step = error instanceof WebhookProcessingError ? error.step : "handler";
    this.logger.error(
      { err: error, eventId: event.event_id, provider: event.provider, step },
      "webhook processing failed",
    );

    try {
      await this.coordinator.finalize(event.id, { ok: false, errorMessage: message });
    } catch (finalizeError) {
      this.logger.error({ err: finalizeError, eventId: event.event_id }, "failed to record webhook failure");
    }

    try {
      await this.alerts.sendCriticalAlert({
        title: "Webhook processing failed",
        message: `${event.provider} event ${event.event_id} failed at ${step}: ${message}`,
        platform: event.provider,
      });
    } catch (alertError) {
      this.logger.error({ err: alertError, eventId: event.event_id }, "failed to send webhook failure alert");
    }
  }
}
