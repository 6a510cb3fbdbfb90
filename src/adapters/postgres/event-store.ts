import { randomUUID } from "node:crypto";
import type { Pool } from "pg";
import type { CreateWebhookEventInput, WebhookEventRecord } from "../../domain/types.js";
import { AppError, DuplicateEventError } from "../../infra/app-error.js";
import { isRecord } from "../../infra/json.js";
import type { EventStorePort } from "../../ports/event-store.js";

interface WebhookEventRow {
  id: string;
  event_id: string;
  provider: string;
  event_type: string;
  correlation_id: string | null;
  payload: unknown;
  processed: boolean;
  error_message: string | null;
  created_at: unknown;
  updated_at: unknown;
}

const EVENT_COLUMNS = `
  id, event_id, provider, event_type, correlation_id, payload,
  processed, error_message, created_at, updated_at
`;

function toIso(value: unknown): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

function mapRow(row: WebhookEventRow): WebhookEventRecord {
  return {
    id: row.id,
    event_id: row.event_id,
    provider: row.provider,
    event_type: row.event_type,
    correlation_id: row.correlation_id,
    payload: isRecord(row.payload) ? row.payload : {},
    processed: row.processed,
    error_message: row.error_message,
    created_at: toIso(row.created_at),
    updated_at: toIso(row.updated_at),
  };
}

export function isUniqueViolation(error: unknown): boolean {
  return isRecord(error) && error.code === "23505";
}

export class PostgresEventStore implements EventStorePort {
  constructor(private readonly pool: Pool) {}

  async findByEventId(eventId: string): Promise<WebhookEventRecord | null> {
    const result = await this.pool.query<WebhookEventRow>(
      `
        SELECT ${EVENT_COLUMNS}
        FROM webhook_events
        WHERE event_id = $1
      `,
      [eventId],
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async create(input: CreateWebhookEventInput): Promise<WebhookEventRecord> {
    try {
      const result = await this.pool.query<WebhookEventRow>(
        `
          INSERT INTO webhook_events (id, event_id, provider, event_type, correlation_id, payload)
          VALUES ($1, $2, $3, $4, $5, $6::jsonb)
          RETURNING ${EVENT_COLUMNS}
        `,
        [
          `evt_${randomUUID()}`,
          input.eventId,
          input.provider,
          input.eventType,
          input.correlationId,
          JSON.stringify(input.payload),
        ],
      );
      const row = result.rows[0];
      if (!row) {
        throw new AppError(500, "event_store_write_failed", "Insert returned no webhook event row.");
      }
      return mapRow(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEventError(input.eventId);
      }
      throw error;
    }
  }

  async claimFailed(id: string): Promise<WebhookEventRecord | null> {
    const result = await this.pool.query<WebhookEventRow>(
      `
        UPDATE webhook_events
        SET error_message = NULL, updated_at = NOW()
        WHERE id = $1
          AND error_message IS NOT NULL
        RETURNING ${EVENT_COLUMNS}
      `,
      [id],
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async markProcessed(id: string): Promise<void> {
    await this.pool.query(
      `
        UPDATE webhook_events
        SET processed = TRUE, error_message = NULL, updated_at = NOW()
        WHERE id = $1
      `,
      [id],
    );
  }

  async markFailed(id: string, errorMessage: string): Promise<void> {
    await this.pool.query(
      `
        UPDATE webhook_events
        SET processed = FALSE, error_message = $2, updated_at = NOW()
        WHERE id = $1
      `,
      [id, errorMessage],
    );
  }

  async listByCorrelationId(correlationId: string, limit: number): Promise<WebhookEventRecord[]> {
    const result = await this.pool.query<WebhookEventRow>(
      `
        SELECT ${EVENT_COLUMNS}
        FROM webhook_events
        WHERE correlation_id = $1
        ORDER BY created_at DESC
        LIMIT $2
      `,
      [correlationId, limit],
    );
    return result.rows.map(mapRow);
  }
}
