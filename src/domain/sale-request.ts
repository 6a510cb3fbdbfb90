import type { CheckoutSessionData, CheckoutSessionFields } from "./types.js";

const ORDER_DESCRIPTION_LIMIT = 100;
const LOOPBACK_ADDRESS = /^(::1|::ffff:127\.0\.0\.1|127\.0\.0\.1|0\.0\.0\.0)$/;

const CUSTOMER_FIELDS = [
  ["customer_email", "customerEmail"],
  ["customer_first_name", "customerFirstName"],
  ["customer_last_name", "customerLastName"],
  ["card_holder_name", "cardHolderName"],
  ["customer_phone", "customerPhone"],
  ["customer_address", "customerAddress"],
  ["customer_city", "customerCity"],
  ["customer_state", "customerState"],
  ["customer_zip_code", "customerZipCode"],
  ["customer_country_code", "customerCountryCode"],
] as const satisfies ReadonlyArray<readonly [keyof CheckoutSessionFields, string]>;

export function roundAmount(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export function sanitizeOrderDescription(description: string | undefined, clientOrderId: string): string {
  const cleaned = (description ?? "")
    .replace(/[^\p{L}\p{N}_\s,.\-]/gu, "")
    .replace(/\s{2,}/g, " ")
    .trim()
    .slice(0, ORDER_DESCRIPTION_LIMIT)
    .trim();
  return cleaned || `Order ${clientOrderId}`;
}

export function isLoopbackAddress(address: string): boolean {
  return LOOPBACK_ADDRESS.test(address.trim());
}

export function customerFields(data: CheckoutSessionData): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const [sessionKey, saleKey] of CUSTOMER_FIELDS) {
    const value = data[sessionKey];
    if (typeof value === "string" && value.trim().length > 0) {
      fields[saleKey] = value.trim();
    }
  }
  return fields;
}
