import type { Logger } from "pino";
import { readText } from "../domain/sale-response.js";
import { WebhookProcessingError } from "../infra/app-error.js";
import { isRecord } from "../infra/json.js";
import type { FulfillmentBackendPort } from "../ports/fulfillment-backend.js";

export interface SettlementResult {
  cartId: string;
  paymentId: string;
  payment: Record<string, unknown> | null;
}

function firstRecord(value: unknown): Record<string, unknown> | null {
  if (!Array.isArray(value)) {
    return null;
  }
  const first: unknown = value[0];
  return isRecord(first) ? first : null;
}

export class SettlementService {
  constructor(
    private readonly backend: FulfillmentBackendPort,
    private readonly publishableKey: string | undefined,
    private readonly logger: Logger,
  ) {}

  async settle(cartId: string): Promise<SettlementResult> {
    const paymentSessionId = await this.lookupPaymentSession(cartId);
    const paymentId = await this.resolvePayment(cartId, paymentSessionId);

    const capture = await this.backend.execute({
      endpoint: `/admin/payments/${encodeURIComponent(paymentId)}/capture`,
      method: "POST",
    });
    if (!capture.success) {
      throw new WebhookProcessingError(
        "capture_payment",
        `Capturing payment ${paymentId} for cart ${cartId} failed: ${capture.message}`,
      );
    }

    this.logger.info({ cartId, paymentId }, "cart settled");
    const payment = capture.data?.payment;
    return { cartId, paymentId, payment: isRecord(payment) ? payment : null };
  }

  private async lookupPaymentSession(cartId: string): Promise<string> {
    if (!this.publishableKey) {
      throw new WebhookProcessingError("lookup_cart_payment", "Fulfillment publishable key is not configured");
    }
    const response = await this.backend.execute({
      endpoint: `/store/carts/${encodeURIComponent(cartId)}`,
      method: "GET",
      params: { fields: "+payment_collection" },
      headers: {
        authorization: `Bearer ${this.publishableKey}`,
        "x-publishable-api-key": this.publishableKey,
      },
      useAdminToken: false,
    });
    if (!response.success) {
      throw new WebhookProcessingError(
        "lookup_cart_payment",
        `Loading cart ${cartId} failed: ${response.message}`,
      );
    }

    const cart = response.data?.cart;
    const collection = isRecord(cart) ? cart.payment_collection : undefined;
    const session = isRecord(collection) ? firstRecord(collection.payment_sessions) : null;
    const sessionId = session ? readText(session, "id") : null;
    if (!sessionId) {
      throw new WebhookProcessingError("lookup_cart_payment", `Cart ${cartId} has no payment session`);
    }
    return sessionId;
  }

  private async resolvePayment(cartId: string, paymentSessionId: string): Promise<string> {
    const response = await this.backend.execute({
      endpoint: "/admin/payments",
      method: "GET",
      params: { payment_session_id: paymentSessionId },
    });
    if (!response.success) {
      throw new WebhookProcessingError(
        "resolve_payment",
        `Listing payments for session ${paymentSessionId} failed: ${response.message}`,
      );
    }
    const payment = firstRecord(response.data?.payments);
    const paymentId = payment ? readText(payment, "id") : null;
    if (!paymentId) {
      throw new WebhookProcessingError("resolve_payment", `No payment found for cart ${cartId}`);
    }
    return paymentId;
  }
}
