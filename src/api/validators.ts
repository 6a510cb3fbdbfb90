import type { SessionRequest } from "../application/gateway-session-orchestrator.js";
import type { CheckoutSessionData, CheckoutSessionFields } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { HostedPageReturnUrls } from "../infra/config.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

type StringSessionKey = {
  [Key in keyof CheckoutSessionFields]-?: CheckoutSessionFields[Key] extends string | undefined ? Key : never;
}[keyof CheckoutSessionFields];

type BooleanSessionKey = {
  [Key in keyof CheckoutSessionFields]-?: CheckoutSessionFields[Key] extends boolean | undefined ? Key : never;
}[keyof CheckoutSessionFields];

// Canonical key first, then the aliases storefronts send for it.
const STRING_FIELDS: ReadonlyArray<readonly [StringSessionKey, ...string[]]> = [
  ["id"],
  ["currency_code", "currencyCode", "currency"],
  ["cart_id", "cartId"],
  ["client_order_id", "clientOrderId"],
  ["order_description", "orderDescription", "order_desc"],
  ["netvalve_token", "netvalveToken"],
  ["payment_token", "paymentToken"],
  ["hpf_payment_token", "hpfPaymentToken"],
  ["transaction_id", "transactionId"],
  ["netvalve_transaction_id", "netvalveTransactionId"],
  ["order_id", "orderId"],
  ["checkout_id", "checkoutId"],
  ["customer_email", "email", "emailAddress", "email_address"],
  ["customer_first_name", "firstName", "first_name"],
  ["customer_last_name", "lastName", "last_name"],
  ["card_holder_name", "cardHolderName"],
  ["customer_phone", "phone"],
  ["customer_address", "address"],
  ["customer_city", "city"],
  ["customer_state", "state"],
  ["customer_zip_code", "zip", "postal_code"],
  ["customer_country_code", "country_code", "countryCode"],
  ["client_ip_address", "ipAddress", "ip_address"],
  ["card_expiry", "cardExpiry"],
];

const BOOLEAN_FIELDS: readonly BooleanSessionKey[] = [
  "authorized",
  "is_authorized",
  "hpf_completed",
  "card_form_submitted",
  "netvalve_sale_success",
];

const TYPED_SESSION_KEYS = new Set<string>([
  ...STRING_FIELDS.map(([canonical]) => canonical),
  ...BOOLEAN_FIELDS,
  "amount",
]);

function readSessionString(source: Record<string, unknown>, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      return String(value);
    }
  }
  return undefined;
}

function readSessionBoolean(source: Record<string, unknown>, key: string): boolean | undefined {
  const value = source[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (value === "true" || value === "false") {
    return value === "true";
  }
  if (value !== undefined && value !== null) {
    throw new AppError(422, "invalid_session_data", `${key} must be a boolean.`);
  }
  return undefined;
}

function readAmount(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  const amount = typeof value === "string" ? Number(value) : value;
  if (typeof amount !== "number" || !Number.isFinite(amount) || amount < 0) {
    throw new AppError(422, "invalid_amount", `${field} must be a non-negative number.`);
  }
  return amount;
}

/**
 * Accepts the session object itself or wrapped as `{ data: {...} }`. Canonical keys are written from
 * their normalized values (aliases folded in); every other key is carried through unchanged.
 */
export function parseCheckoutSessionData(payload: unknown): CheckoutSessionData {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  const source = isObject(payload.data) ? payload.data : payload;
  const data: CheckoutSessionData = {};
  for (const [key, value] of Object.entries(source)) {
    if (!TYPED_SESSION_KEYS.has(key)) {
      data[key] = value;
    }
  }

  for (const [canonical, ...aliases] of STRING_FIELDS) {
    const value = readSessionString(source, [canonical, ...aliases]);
    if (value !== undefined) {
      data[canonical] = value;
    }
  }
  for (const key of BOOLEAN_FIELDS) {
    const value = readSessionBoolean(source, key);
    if (value !== undefined) {
      data[key] = value;
    }
  }
  const amount = readAmount(source.amount, "amount");
  if (amount !== undefined) {
    data.amount = amount;
  }
  if (data.currency_code) {
    data.currency_code = data.currency_code.toUpperCase();
  }
  return data;
}

export function parseSessionRequest(payload: unknown): SessionRequest {
  const source = isObject(payload) ? payload : {};
  const currency = readSessionString(source, ["currency_code", "currencyCode", "currency"]) ?? "USD";
  if (!/^[A-Za-z]{3}$/.test(currency)) {
    throw new AppError(422, "invalid_currency", "currency_code must be a 3-letter ISO code.");
  }

  const returnUrls: HostedPageReturnUrls = {};
  for (const kind of ["success", "cancel", "failed", "pending"] as const) {
    const url = readSessionString(source, [`${kind}_url`, `${kind}Url`]);
    if (url) {
      returnUrls[kind] = url;
    }
  }

  const amount = readAmount(source.amount, "amount");
  const cartId = readSessionString(source, ["cart_id", "cartId"]);
  const orderDescription = readSessionString(source, ["order_desc", "order_description", "orderDesc"]);
  return {
    currencyCode: currency.toUpperCase(),
    ...(amount !== undefined ? { amount } : {}),
    ...(cartId ? { cartId } : {}),
    ...(orderDescription ? { orderDescription } : {}),
    ...(Object.keys(returnUrls).length > 0 ? { returnUrls } : {}),
  };
}

export interface FundOperationInput {
  transactionId: string;
  amount: number;
  alreadyCaptured: boolean;
}

export function parseFundOperationInput(payload: unknown, options: { requireAmount: boolean }): FundOperationInput {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  const transactionId = readSessionString(payload, ["transaction_id", "transactionId", "netvalve_transaction_id"]);
  if (!transactionId) {
    throw new AppError(422, "invalid_transaction_id", "transaction_id is required.");
  }
  const amount = readAmount(payload.amount, "amount");
  if (options.requireAmount && (amount === undefined || amount <= 0)) {
    throw new AppError(422, "invalid_amount", "amount must be greater than zero.");
  }
  const alreadyCaptured = payload.already_captured;
  if (alreadyCaptured !== undefined && typeof alreadyCaptured !== "boolean") {
    throw new AppError(422, "invalid_already_captured", "already_captured must be a boolean.");
  }
  return { transactionId, amount: amount ?? 0, alreadyCaptured: alreadyCaptured === true };
}

export function assertJsonObject(payload: unknown): asserts payload is Record<string, unknown> {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
}

export function requireHeader(headers: Record<string, unknown>, name: string): string {
  const value = headers[name];
  if (!isString(value) || value.trim().length === 0) {
    throw new AppError(400, "missing_event_headers", `${name} header is required.`);
  }
  return value.trim();
}

export type NormalizedPaymentStatus = "authorized" | "captured" | "pending" | "requires_more" | "error" | "canceled";

const paymentStatuses: ReadonlySet<string> = new Set<NormalizedPaymentStatus>([
  "authorized",
  "captured",
  "pending",
  "requires_more",
  "error",
  "canceled",
]);

function isPaymentStatus(value: string): value is NormalizedPaymentStatus {
  return paymentStatuses.has(value);
}

export function normalizePaymentStatus(value: unknown): NormalizedPaymentStatus {
  if (!isString(value)) {
    return "pending";
  }
  const normalized = value.trim().toLowerCase();
  return isPaymentStatus(normalized) ? normalized : "pending";
}

export function normalizeResourceId(value: unknown, field: string): string {
  if (!isString(value) || value.trim().length === 0 || value.length > 255) {
    throw new AppError(422, "invalid_resource_id", `${field} is required.`);
  }
  return value.trim();
}

export function normalizeLimit(value: unknown, defaultValue: number, maxValue: number): number {
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > maxValue) {
    throw new AppError(422, "invalid_limit", `limit must be an integer between 1 and ${maxValue}.`);
  }
  return parsed;
}
