import type { CreateWebhookEventInput, WebhookEventRecord } from "../domain/types.js";

export interface EventStorePort {
  findByEventId(eventId: string): Promise<WebhookEventRecord | null>;
  /** Throws DuplicateEventError when the event id is already stored. */
  create(input: CreateWebhookEventInput): Promise<WebhookEventRecord>;
  /**
   * Clears the error of a failed row so it can be executed again. Returns null when the row
   * no longer carries an error, i.e. another delivery already claimed it.
   */
  claimFailed(id: string): Promise<WebhookEventRecord | null>;
  markProcessed(id: string): Promise<void>;
  markFailed(id: string, errorMessage: string): Promise<void>;
  listByCorrelationId(correlationId: string, limit: number): Promise<WebhookEventRecord[]>;
}
