export type WebhookAction =
  | "AUTHORIZED"
  | "SUCCESSFUL"
  | "PENDING"
  | "REQUIRES_MORE"
  | "FAILED"
  | "CANCELED"
  | "NOT_SUPPORTED";

export interface GatewayWebhookData {
  session_id: string;
  amount: number | string;
}

export interface GatewayWebhookClassification {
  action: WebhookAction;
  data: GatewayWebhookData | null;
}

// First match wins; "paid" must not be shadowed by a later rule.
const ACTION_RULES: ReadonlyArray<{ action: WebhookAction; needles: readonly string[] }> = [
  { action: "AUTHORIZED", needles: ["authorized"] },
  { action: "SUCCESSFUL", needles: ["captured", "paid"] },
  { action: "PENDING", needles: ["pending"] },
  { action: "REQUIRES_MORE", needles: ["requires_more", "action_required"] },
  { action: "FAILED", needles: ["failed", "declined"] },
  { action: "CANCELED", needles: ["canceled", "cancelled"] },
];

export function classifyEventType(eventType: unknown): WebhookAction {
  if (typeof eventType !== "string") {
    return "NOT_SUPPORTED";
  }
  const normalized = eventType.toLowerCase();
  for (const rule of ACTION_RULES) {
    if (rule.needles.some((needle) => normalized.includes(needle))) {
      return rule.action;
    }
  }
  return "NOT_SUPPORTED";
}

export function classifyGatewayWebhook(payload: Record<string, unknown>): GatewayWebhookClassification {
  const action = classifyEventType(payload.type);
  const sessionId = payload.session_id ?? payload.id;
  const amount = payload.amount;
  if (
    typeof sessionId === "string"
    && sessionId.length > 0
    && (typeof amount === "number" || typeof amount === "string")
  ) {
    return { action, data: { session_id: sessionId, amount } };
  }
  return { action, data: null };
}
