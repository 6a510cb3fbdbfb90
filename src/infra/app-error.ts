export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export type SettlementStep = "lookup_cart_payment" | "resolve_payment" | "capture_payment";

export class WebhookProcessingError extends AppError {
  constructor(
    public readonly step: SettlementStep,
    message: string,
  ) {
    super(500, "webhook_processing_error", message);
    this.name = "WebhookProcessingError";
  }
}

/**
 * Raised by event stores when a row with the same external event id already exists.
 * Losing an insert race is expected under concurrent delivery.
 */
export class DuplicateEventError extends Error {
  constructor(public readonly eventId: string) {
    super(`Webhook event '${eventId}' already exists.`);
    this.name = "DuplicateEventError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
