import type { Logger } from "pino";
import { classifySale } from "../domain/sale-classification.js";
import {
  customerFields,
  isLoopbackAddress,
  roundAmount,
  sanitizeOrderDescription,
} from "../domain/sale-request.js";
import { interpretSaleResponse } from "../domain/sale-response.js";
import type {
  AuthorizationPath,
  AuthorizationResult,
  AuthorizedSessionData,
  CheckoutSessionData,
  SaleFailureKind,
  SalePaymentType,
  SaleRequestEcho,
  SaleResult,
} from "../domain/types.js";
import { epochSeconds, type ClockPort } from "../infra/clock.js";
import { resolveMidId, type GatewayConfig } from "../infra/config.js";
import { maskToken } from "../infra/logger.js";
import type { CardGatewayPort } from "../ports/card-gateway.js";
import type { PublicIpResolverPort } from "../ports/public-ip.js";

const AUTHORIZATION_FLAGS = ["authorized", "is_authorized", "hpf_completed", "card_form_submitted"] as const;
const AUTHORIZATION_PROOFS = [
  "netvalve_token",
  "transaction_id",
  "netvalve_transaction_id",
  "order_id",
  "checkout_id",
] as const;
const EXTERNAL_PROOFS = ["transaction_id", "netvalve_transaction_id", "order_id"] as const;

export const CARD_INPUT_REQUIRED_MESSAGE = "Card details are required before the order can be authorized.";
export const UNVERIFIED_PAYMENT_MESSAGE =
  "Payment declined: the card payment could not be verified with the gateway. Please try a different card.";

function hasText(value: string | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export function hasAuthorizationProof(data: CheckoutSessionData): boolean {
  return (
    AUTHORIZATION_FLAGS.some((flag) => data[flag] === true)
    || AUTHORIZATION_PROOFS.some((key) => hasText(data[key]))
  );
}

export function hasExternalProof(data: CheckoutSessionData): boolean {
  return EXTERNAL_PROOFS.some((key) => hasText(data[key]));
}

export function declineMessage(sale: SaleResult): string {
  if (sale.failure !== null) {
    return `Payment could not be completed (${sale.responseMessage}). Please try a different card.`;
  }
  const detail = sale.declineReason
    ? ` (${sale.declineReason})`
    : sale.bankResponseCode
      ? ` (bank code ${sale.bankResponseCode})`
      : "";
  return `Payment declined${detail}. Please try a different card.`;
}

function saleAnnotations(sale: SaleResult): Partial<AuthorizedSessionData> {
  const { request, card } = sale;
  return {
    netvalve_sale_attempted: true,
    netvalve_sale_success: sale.success,
    client_order_id: request.clientOrderId,
    amount: request.amount,
    currency: request.currency,
    ...(sale.orderId ? { netvalve_order_id: sale.orderId } : {}),
    ...(sale.responseCode ? { netvalve_response_code: sale.responseCode } : {}),
    ...(sale.responseMessage ? { netvalve_response_message: sale.responseMessage } : {}),
    ...(sale.bankResponseCode ? { netvalve_bank_response_code: sale.bankResponseCode } : {}),
    ...(request.paymentToken ? { payment_token: request.paymentToken } : {}),
    ...(request.siteId ? { site_id: request.siteId } : {}),
    ...(request.midId ? { mid_id: request.midId } : {}),
    ...(card.cardNumber ? { card_number: card.cardNumber } : {}),
    ...(card.cardType ? { card_type: card.cardType } : {}),
    ...(card.cardExpiry ? { card_expiry: card.cardExpiry } : {}),
    ...(card.cardHolderName ? { card_holder_name: card.cardHolderName } : {}),
    ...(sale.gatewayErrors ? { gateway_errors: sale.gatewayErrors } : {}),
  };
}

export class GatewayAuthorizationOrchestrator {
  constructor(
    private readonly gateway: CardGatewayPort,
    private readonly config: GatewayConfig,
    private readonly publicIp: PublicIpResolverPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
  ) {}

  async authorize(input: CheckoutSessionData): Promise<AuthorizationResult> {
    const data: CheckoutSessionData = { ...input };
    const id = data.id ?? `netvalve_${epochSeconds(this.clock)}`;

    if (!hasAuthorizationProof(data)) {
      return {
        status: "requires_more",
        reason: "card_input_required",
        data: {
          ...data,
          id,
          status: "requires_more",
          requires_payment_input: true,
          message: CARD_INPUT_REQUIRED_MESSAGE,
        },
      };
    }

    if (data.netvalve_sale_success === true && hasText(data.netvalve_transaction_id)) {
      return {
        status: "authorized",
        path: "stored_sale",
        sale: null,
        data: this.authorizedData(data, id, data["authorized_at"]),
      };
    }

    if (data.hpf_completed === true) {
      return this.authorizeWithSale(data, id, "hosted_fields_sale", "CARD");
    }

    if (hasText(data.netvalve_token) && data.netvalve_token !== data.hpf_payment_token) {
      return this.authorizeWithSale(data, id, "token_sale", "TOKEN");
    }

    if (hasExternalProof(data)) {
      return { status: "authorized", path: "external_proof", sale: null, data: this.authorizedData(data, id) };
    }

    this.logger.warn({ sessionId: id }, "payment proof could not be verified");
    return {
      status: "requires_more",
      reason: "unverified",
      data: {
        ...data,
        id,
        status: "requires_more",
        requires_payment_input: true,
        error_message: UNVERIFIED_PAYMENT_MESSAGE,
      },
    };
  }

  async executeSale(data: CheckoutSessionData, paymentType: SalePaymentType): Promise<SaleResult> {
    const currency = (data.currency_code ?? "USD").trim().toUpperCase() || "USD";
    const token = [data.netvalve_token, data.payment_token, data.hpf_payment_token].find(hasText) ?? null;
    const clientOrderId =
      [data.cart_id, data.client_order_id, data.id].find(hasText) ?? `order_${epochSeconds(this.clock)}`;
    const echo: SaleRequestEcho = {
      clientOrderId,
      paymentToken: token,
      siteId: this.config.siteId ?? null,
      midId: resolveMidId(this.config, currency) ?? null,
      amount: roundAmount(data.amount ?? 0),
      currency,
    };

    if (!token) {
      return this.failedSale(echo, "missing_token", "No payment token available", null, data);
    }

    const customerIp = await this.resolveCustomerIp(data.client_ip_address);
    const payload: Record<string, unknown> = {
      amount: echo.amount,
      currency,
      paymentType,
      paymentToken: token,
      clientOrderId,
      orderDesc: sanitizeOrderDescription(data.order_description, clientOrderId),
      ...(echo.siteId ? { siteId: echo.siteId } : {}),
      ...(echo.midId ? { netvalveMidId: echo.midId } : {}),
      ...(customerIp ? { customerIp } : {}),
      ...customerFields(data),
    };

    const response = await this.gateway.sale(payload);
    if (!response.ok) {
      const { failure } = response;
      if (failure.kind === "transport_error") {
        return this.failedSale(echo, "transport_error", `Network error: ${failure.message}`, null, data);
      }
      const responseCode = failure.httpStatus !== undefined ? String(failure.httpStatus) : null;
      const kind = failure.kind === "missing_credentials" ? "missing_credentials" : "invalid_response";
      return this.failedSale(echo, kind, failure.message, responseCode, data);
    }

    const { httpStatus, body } = response.value;
    const interpreted = interpretSaleResponse(body, data.card_expiry ?? null);
    const classification = classifySale({
      httpStatus,
      responseCode: interpreted.responseCode,
      responseCodeType: interpreted.responseCodeType,
      responseMessage: interpreted.responseMessage,
      bankResponseCode: interpreted.bankResponseCode,
    });

    const logFields = {
      clientOrderId,
      paymentType,
      token: maskToken(token),
      responseCode: interpreted.responseCode,
      bankResponseCode: interpreted.bankResponseCode,
    };
    if (classification.approved) {
      this.logger.info(logFields, "gateway sale approved");
    } else {
      this.logger.warn({ ...logFields, signals: classification.signals }, "gateway sale declined");
    }

    return {
      success: classification.approved,
      transactionId: interpreted.transactionId,
      orderId: interpreted.orderId,
      responseCode: interpreted.responseCode,
      responseMessage: interpreted.responseMessage,
      bankResponseCode: interpreted.bankResponseCode,
      declineReason: classification.declineReason,
      card: {
        ...interpreted.card,
        cardHolderName: interpreted.card.cardHolderName ?? data.card_holder_name ?? null,
      },
      gatewayErrors: interpreted.gatewayErrors,
      raw: body,
      failure: null,
      request: echo,
    };
  }

  private async authorizeWithSale(
    data: CheckoutSessionData,
    id: string,
    path: AuthorizationPath,
    paymentType: SalePaymentType,
  ): Promise<AuthorizationResult> {
    const sale = await this.executeSale(data, paymentType);

    if (sale.success) {
      const authorized: AuthorizedSessionData = {
        ...this.authorizedData(data, id),
        ...saleAnnotations(sale),
        ...(sale.transactionId ? { netvalve_transaction_id: sale.transactionId, transaction_id: sale.transactionId } : {}),
        ...(paymentType === "CARD" ? { payment_flow: "hpf" as const } : {}),
      };
      return { status: "authorized", path, sale, data: authorized };
    }

    // No transaction id on a declined session: it would count as external proof on the next call.
    const declined: AuthorizedSessionData = {
      ...data,
      ...saleAnnotations(sale),
      id,
      status: "requires_more",
      requires_payment_input: true,
      error_message: declineMessage(sale),
      ...(sale.declineReason ? { netvalve_decline_reason: sale.declineReason } : {}),
    };
    return { status: sale.failure === null ? "declined" : "error", path, sale, data: declined };
  }

  private authorizedData(data: CheckoutSessionData, id: string, authorizedAt?: unknown): AuthorizedSessionData {
    return {
      ...data,
      id,
      status: "authorized",
      requires_payment_input: false,
      payment_type: "card",
      authorized_at: typeof authorizedAt === "string" && authorizedAt.length > 0 ? authorizedAt : this.clock.nowIso(),
    };
  }

  private failedSale(
    echo: SaleRequestEcho,
    failure: SaleFailureKind,
    message: string,
    responseCode: string | null,
    data: CheckoutSessionData,
  ): SaleResult {
    this.logger.error({ clientOrderId: echo.clientOrderId, failure, message }, "gateway sale failed");
    return {
      success: false,
      transactionId: null,
      orderId: null,
      responseCode,
      responseMessage: message,
      bankResponseCode: null,
      declineReason: null,
      card: {
        cardNumber: null,
        cardType: null,
        cardExpiry: data.card_expiry ?? null,
        cardHolderName: data.card_holder_name ?? null,
      },
      gatewayErrors: null,
      raw: null,
      failure,
      request: echo,
    };
  }

  private async resolveCustomerIp(clientIp: string | undefined): Promise<string | null> {
    if (hasText(clientIp) && !isLoopbackAddress(clientIp)) {
      return clientIp.trim();
    }
    return this.publicIp.resolve();
  }
}
