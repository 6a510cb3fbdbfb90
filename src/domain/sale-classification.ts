export const APPROVED_RESPONSE_CODE = "GTW_1000";
export const APPROVED_BANK_CODE = "BNK_2000";

const DECLINE_BANK_REASONS: Readonly<Record<string, string>> = {
  "05": "Card declined by issuing bank",
  "51": "Insufficient funds",
  "14": "Invalid card number",
  "54": "Card expired",
  "41": "Card reported lost",
  "43": "Card reported stolen",
  "61": "Exceeds withdrawal limit",
  "62": "Restricted card",
  "65": "Exceeds withdrawal frequency",
};

const DECLINE_MESSAGE_PATTERN =
  /declin|insufficient|invalid|not supported|failed|do not honor|expired|lost|stolen|restricted/i;

const DECLINE_TYPE_MARKERS = ["DECLINE", "FAILED", "REJECT"] as const;

export type DeclineSignal =
  | "http_status"
  | "response_code"
  | "response_code_type"
  | "decline_message"
  | "bank_prefixed_code"
  | "bank_decline_code";

export interface SaleSignals {
  httpStatus: number;
  responseCode: string | null;
  responseCodeType: string | null;
  responseMessage: string;
  bankResponseCode: string | null;
}

export interface SaleClassification {
  approved: boolean;
  signals: DeclineSignal[];
  declineReason: string | null;
}

function isForeignBankCode(code: string | null): boolean {
  return code !== null && code.toUpperCase().startsWith("BNK_") && code.toUpperCase() !== APPROVED_BANK_CODE;
}

export function bankDeclineReason(bankResponseCode: string | null): string | null {
  if (bankResponseCode === null) {
    return null;
  }
  return DECLINE_BANK_REASONS[bankResponseCode.trim()] ?? null;
}

/**
 * The gateway reports an approval code on some declines, so every signal is checked and any
 * one of them is enough to treat the sale as declined.
 */
export function classifySale(signals: SaleSignals): SaleClassification {
  const found: DeclineSignal[] = [];

  if (signals.httpStatus >= 400) {
    found.push("http_status");
  }
  if (signals.responseCode !== APPROVED_RESPONSE_CODE) {
    found.push("response_code");
  }
  const codeType = signals.responseCodeType?.toUpperCase() ?? "";
  if (DECLINE_TYPE_MARKERS.some((marker) => codeType.includes(marker))) {
    found.push("response_code_type");
  }
  if (DECLINE_MESSAGE_PATTERN.test(signals.responseMessage)) {
    found.push("decline_message");
  }
  if (isForeignBankCode(signals.responseCode) || isForeignBankCode(signals.bankResponseCode)) {
    found.push("bank_prefixed_code");
  }
  const declineReason = bankDeclineReason(signals.bankResponseCode);
  if (declineReason !== null) {
    found.push("bank_decline_code");
  }

  return { approved: found.length === 0, signals: found, declineReason };
}
