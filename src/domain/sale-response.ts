import { isRecord } from "../infra/json.js";
import type { CardMetadata } from "./types.js";

export interface InterpretedSaleResponse {
  responseCode: string | null;
  responseCodeType: string | null;
  responseMessage: string;
  transactionId: string | null;
  orderId: string | null;
  bankResponseCode: string | null;
  card: CardMetadata;
  gatewayErrors: Record<string, unknown> | null;
}

const EXPIRY_KEYS = ["cardExpiry", "card_expiry", "cardExpiryDate", "expiryDate", "expiry_date", "expiry"] as const;
const EXPIRY_MONTH_KEYS = ["cardExpiryMonth", "expiryMonth", "expMonth", "expiry_month"] as const;
const EXPIRY_YEAR_KEYS = ["cardExpiryYear", "expiryYear", "expYear", "expiry_year"] as const;

export function readText(source: Record<string, unknown>, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      return String(value);
    }
  }
  return null;
}

export function formatExpiry(month: string, year: string): string | null {
  const monthNumber = Number(month);
  if (!Number.isInteger(monthNumber) || monthNumber < 1 || monthNumber > 12) {
    return null;
  }
  const digits = year.replace(/\D/g, "");
  const fullYear = digits.length === 2 ? `20${digits}` : digits;
  if (fullYear.length !== 4) {
    return null;
  }
  return `${String(monthNumber).padStart(2, "0")}/${fullYear}`;
}

function readExpiry(body: Record<string, unknown>): string | null {
  const direct = readText(body, ...EXPIRY_KEYS);
  if (direct) {
    return direct;
  }
  const month = readText(body, ...EXPIRY_MONTH_KEYS);
  const year = readText(body, ...EXPIRY_YEAR_KEYS);
  if (month && year) {
    return formatExpiry(month, year);
  }
  return null;
}

export function interpretSaleResponse(
  body: Record<string, unknown>,
  fallbackExpiry: string | null,
): InterpretedSaleResponse {
  const codeType = readText(body, "responseCodeType", "response_code_type");
  const errors = body.errors;
  return {
    responseCode: readText(body, "responseCode", "response_code"),
    responseCodeType: codeType ? codeType.toUpperCase() : null,
    responseMessage: readText(body, "responseMessage", "response_message", "message") ?? "",
    transactionId: readText(body, "transactionID", "transactionId", "transaction_id"),
    orderId: readText(body, "orderId", "orderID", "order_id"),
    bankResponseCode: readText(body, "bankResponseCode", "bank_response_code"),
    card: {
      cardNumber: readText(body, "cardNumber", "card_number"),
      cardType: readText(body, "cardType", "card_type"),
      cardExpiry: readExpiry(body) ?? fallbackExpiry,
      cardHolderName: readText(body, "cardHolderName", "card_holder_name"),
    },
    gatewayErrors: isRecord(errors) && Object.keys(errors).length > 0 ? errors : null,
  };
}
