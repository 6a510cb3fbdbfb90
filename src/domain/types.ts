export type WebhookProvider = "solidgate" | "ordergroove";

export interface WebhookEventRecord {
  id: string;
  event_id: string;
  provider: string;
  event_type: string;
  correlation_id: string | null;
  payload: Record<string, unknown>;
  processed: boolean;
  error_message: string | null;
  created_at: string;
  updated_at: string;
}

export interface CreateWebhookEventInput {
  eventId: string;
  provider: WebhookProvider;
  eventType: string;
  correlationId: string | null;
  payload: Record<string, unknown>;
}

export type SkipReason = "already_processed" | "in_flight" | "concurrent_duplicate";

export type Admission =
  | { outcome: "execute"; event: WebhookEventRecord }
  | { outcome: "retry"; event: WebhookEventRecord }
  | { outcome: "skip"; reason: SkipReason; eventId: string };

export type ExecutionOutcome = { ok: true } | { ok: false; errorMessage: string };

/**
 * Checkout state accumulated by the storefront across card entry, sale and order completion.
 * Camel-case aliases are folded into these keys when the request body is validated.
 */
export interface CheckoutSessionFields {
  id?: string;
  amount?: number;
  currency_code?: string;
  cart_id?: string;
  client_order_id?: string;
  order_description?: string;

  netvalve_token?: string;
  payment_token?: string;
  hpf_payment_token?: string;

  authorized?: boolean;
  is_authorized?: boolean;
  hpf_completed?: boolean;
  card_form_submitted?: boolean;

  transaction_id?: string;
  netvalve_transaction_id?: string;
  order_id?: string;
  checkout_id?: string;
  netvalve_sale_success?: boolean;

  customer_email?: string;
  customer_first_name?: string;
  customer_last_name?: string;
  card_holder_name?: string;
  customer_phone?: string;
  customer_address?: string;
  customer_city?: string;
  customer_state?: string;
  customer_zip_code?: string;
  customer_country_code?: string;
  client_ip_address?: string;
  card_expiry?: string;
}

/** The typed fields plus every other key the storefront keeps on the session, returned as received. */
export type CheckoutSessionData = CheckoutSessionFields & { [key: string]: unknown };

export type SessionStatus = "authorized" | "requires_more";

export interface AuthorizedSessionData extends CheckoutSessionData {
  id: string;
  status: SessionStatus;
  requires_payment_input: boolean;
  payment_type?: "card";
  payment_flow?: "hpf";
  authorized_at?: string;
  message?: string;
  error_message?: string;
  netvalve_sale_attempted?: boolean;
  netvalve_order_id?: string;
  netvalve_response_code?: string;
  netvalve_response_message?: string;
  netvalve_bank_response_code?: string;
  netvalve_decline_reason?: string;
  site_id?: string;
  mid_id?: string;
  currency?: string;
  card_number?: string;
  card_type?: string;
  gateway_errors?: Record<string, unknown>;
}

export type SalePaymentType = "CARD" | "TOKEN";

export type SaleFailureKind = "missing_token" | "missing_credentials" | "transport_error" | "invalid_response";

export interface CardMetadata {
  cardNumber: string | null;
  cardType: string | null;
  cardExpiry: string | null;
  cardHolderName: string | null;
}

export interface SaleRequestEcho {
  clientOrderId: string;
  paymentToken: string | null;
  siteId: string | null;
  midId: string | null;
  amount: number;
  currency: string;
}

export interface SaleResult {
  success: boolean;
  transactionId: string | null;
  orderId: string | null;
  responseCode: string | null;
  responseMessage: string;
  bankResponseCode: string | null;
  declineReason: string | null;
  card: CardMetadata;
  gatewayErrors: Record<string, unknown> | null;
  raw: Record<string, unknown> | null;
  failure: SaleFailureKind | null;
  request: SaleRequestEcho;
}

export type AuthorizationPath = "stored_sale" | "hosted_fields_sale" | "token_sale" | "external_proof";

export type AuthorizationResult =
  | { status: "authorized"; path: AuthorizationPath; data: AuthorizedSessionData; sale: SaleResult | null }
  | { status: "requires_more"; reason: "card_input_required" | "unverified"; data: AuthorizedSessionData }
  | { status: "declined"; path: AuthorizationPath; data: AuthorizedSessionData; sale: SaleResult }
  | { status: "error"; path: AuthorizationPath; data: AuthorizedSessionData; sale: SaleResult };

export type FundOperation = "capture" | "refund" | "cancel";

export interface FundOperationResult {
  status: "captured" | "refunded" | "canceled" | "capture_error" | "refund_error" | "cancel_error";
  transactionId: string;
  data: Record<string, unknown>;
  responseCode?: string;
  responseMessage?: string;
  refundedAmount?: number;
  error?: string;
}
