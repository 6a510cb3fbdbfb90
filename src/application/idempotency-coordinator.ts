import type { Logger } from "pino";
import type { Admission, CreateWebhookEventInput, ExecutionOutcome } from "../domain/types.js";
import { DuplicateEventError } from "../infra/app-error.js";
import type { EventStorePort } from "../ports/event-store.js";

export class IdempotencyCoordinator {
  constructor(
    private readonly store: EventStorePort,
    private readonly logger: Logger,
  ) {}

  async admit(input: CreateWebhookEventInput): Promise<Admission> {
    const existing = await this.store.findByEventId(input.eventId);

    if (!existing) {
      try {
        const event = await this.store.create(input);
        return { outcome: "execute", event };
      } catch (error) {
        if (error instanceof DuplicateEventError) {
          this.logger.info({ eventId: input.eventId, provider: input.provider }, "concurrent duplicate delivery skipped");
          return { outcome: "skip", reason: "concurrent_duplicate", eventId: input.eventId };
        }
        throw error;
      }
    }

    if (existing.error_message !== null) {
      const claimed = await this.store.claimFailed(existing.id);
      if (!claimed) {
        this.logger.info({ eventId: input.eventId }, "failed event already claimed by another delivery");
        return { outcome: "skip", reason: "in_flight", eventId: input.eventId };
      }
      this.logger.info(
        { eventId: input.eventId, previousError: existing.error_message },
        "retrying previously failed event",
      );
      return { outcome: "retry", event: claimed };
    }

    if (existing.processed) {
      this.logger.info({ eventId: input.eventId }, "event already processed");
      return { outcome: "skip", reason: "already_processed", eventId: input.eventId };
    }

    // No lease: a row whose handler died before finalizing stays skipped until an operator intervenes.
    this.logger.info({ eventId: input.eventId }, "event in flight");
    return { outcome: "skip", reason: "in_flight", eventId: input.eventId };
  }

  async finalize(rowId: string, outcome: ExecutionOutcome): Promise<void> {
    if (outcome.ok) {
      await this.store.markProcessed(rowId);
      return;
    }
    await this.store.markFailed(rowId, outcome.errorMessage);
  }
}
