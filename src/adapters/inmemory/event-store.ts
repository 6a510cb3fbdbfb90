import { randomUUID } from "node:crypto";
import type { CreateWebhookEventInput, WebhookEventRecord } from "../../domain/types.js";
import { AppError, DuplicateEventError } from "../../infra/app-error.js";
import type { ClockPort } from "../../infra/clock.js";
import { SystemClock } from "../../infra/clock.js";
import type { EventStorePort } from "../../ports/event-store.js";

export class InMemoryEventStore implements EventStorePort {
  private readonly rowsById = new Map<string, WebhookEventRecord>();
  private readonly idsByEventId = new Map<string, string>();

  constructor(private readonly clock: ClockPort = new SystemClock()) {}

  async findByEventId(eventId: string): Promise<WebhookEventRecord | null> {
    const id = this.idsByEventId.get(eventId);
    const row = id ? this.rowsById.get(id) : undefined;
    return row ? { ...row } : null;
  }

  async create(input: CreateWebhookEventInput): Promise<WebhookEventRecord> {
    if (this.idsByEventId.has(input.eventId)) {
      throw new DuplicateEventError(input.eventId);
    }
    const now = this.clock.nowIso();
    const row: WebhookEventRecord = {
      id: `evt_${randomUUID()}`,
      event_id: input.eventId,
      provider: input.provider,
      event_type: input.eventType,
      correlation_id: input.correlationId,
      payload: input.payload,
      processed: false,
      error_message: null,
      created_at: now,
      updated_at: now,
    };
    this.rowsById.set(row.id, row);
    this.idsByEventId.set(row.event_id, row.id);
    return { ...row };
  }

  async claimFailed(id: string): Promise<WebhookEventRecord | null> {
    const row = this.requireRow(id);
    if (row.error_message === null) {
      return null;
    }
    row.error_message = null;
    row.updated_at = this.clock.nowIso();
    return { ...row };
  }

  async markProcessed(id: string): Promise<void> {
    const row = this.requireRow(id);
    row.processed = true;
    row.error_message = null;
    row.updated_at = this.clock.nowIso();
  }

  async markFailed(id: string, errorMessage: string): Promise<void> {
    const row = this.requireRow(id);
    row.processed = false;
    row.error_message = errorMessage;
    row.updated_at = this.clock.nowIso();
  }

  async listByCorrelationId(correlationId: string, limit: number): Promise<WebhookEventRecord[]> {
    return [...this.rowsById.values()]
      .filter((row) => row.correlation_id === correlationId)
      .sort((left, right) => right.created_at.localeCompare(left.created_at))
      .slice(0, limit)
      .map((row) => ({ ...row }));
  }

  private requireRow(id: string): WebhookEventRecord {
    const row = this.rowsById.get(id);
    if (!row) {
      throw new AppError(404, "resource_not_found", "Webhook event not found.");
    }
    return row;
  }
}
