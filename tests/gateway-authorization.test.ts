import { describe, expect, it } from "vitest";
import {
  CARD_INPUT_REQUIRED_MESSAGE,
  GatewayAuthorizationOrchestrator,
  UNVERIFIED_PAYMENT_MESSAGE,
  hasAuthorizationProof,
} from "../src/application/gateway-authorization-orchestrator.js";
import { GatewayFundOperations } from "../src/application/gateway-fund-operations.js";
import type {
  BackofficeToken,
  CardGatewayPort,
  GatewayJsonResponse,
  GatewayRawResponse,
  GatewayResult,
  HostedFieldsScript,
  HostedFieldsSession,
  TransactionOperationBody,
} from "../src/ports/card-gateway.js";
import type { PublicIpResolverPort } from "../src/ports/public-ip.js";
import { parseCheckoutSessionData } from "../src/api/validators.js";
import { MutableClock, gatewayConfig, testLogger } from "./support.js";

const unavailable = { ok: false as const, failure: { kind: "transport_error" as const, message: "not scripted" } };

class FakeCardGateway implements CardGatewayPort {
  readonly sales: Array<Record<string, unknown>> = [];
  readonly operations: Array<{ operation: string; body: TransactionOperationBody }> = [];
  saleResult: GatewayResult<GatewayJsonResponse> = {
    ok: true,
    value: {
      httpStatus: 200,
      body: {
        responseCode: "GTW_1000",
        responseMessage: "Approved",
        transactionID: 555001,
        orderId: "nv_order_1",
        bankResponseCode: "BNK_2000",
        cardNumber: "411111******1111",
        cardType: "VISA",
      },
    },
  };
  operationResult: GatewayResult<GatewayJsonResponse> = {
    ok: true,
    value: { httpStatus: 200, body: { responseCode: "GTW_1000", responseMessage: "Approved" } },
  };

  async initializeHostedFieldsSession(): Promise<GatewayResult<HostedFieldsSession>> {
    return unavailable;
  }

  async signInBackoffice(): Promise<GatewayResult<BackofficeToken>> {
    return unavailable;
  }

  async listHostedFieldsScripts(): Promise<GatewayResult<HostedFieldsScript[]>> {
    return unavailable;
  }

  async postHostedPageOrder(): Promise<GatewayResult<GatewayRawResponse>> {
    return unavailable;
  }

  async sale(payload: Record<string, unknown>): Promise<GatewayResult<GatewayJsonResponse>> {
    this.sales.push(payload);
    return this.saleResult;
  }

  async postTransactionOperation(
    operation: "capture" | "refund" | "cancel",
    body: TransactionOperationBody,
  ): Promise<GatewayResult<GatewayJsonResponse>> {
    this.operations.push({ operation, body });
    return this.operationResult;
  }
}

class FixedPublicIp implements PublicIpResolverPort {
  calls = 0;

  async resolve(): Promise<string | null> {
    this.calls += 1;
    return "198.51.100.20";
  }
}

function setup() {
  const gateway = new FakeCardGateway();
  const publicIp = new FixedPublicIp();
  const clock = new MutableClock("2026-03-01T12:00:00.000Z");
  const orchestrator = new GatewayAuthorizationOrchestrator(gateway, gatewayConfig(), publicIp, clock, testLogger);
  return { gateway, publicIp, clock, orchestrator };
}

describe("GatewayAuthorizationOrchestrator", () => {
  it("asks for card input when the session carries no proof", async () => {
    const { orchestrator, gateway } = setup();

    const result = await orchestrator.authorize({ amount: 20, currency_code: "USD" });

    expect(result).toEqual({
      status: "requires_more",
      reason: "card_input_required",
      data: {
        amount: 20,
        currency_code: "USD",
        id: "netvalve_1772366400",
        status: "requires_more",
        requires_payment_input: true,
        message: CARD_INPUT_REQUIRED_MESSAGE,
      },
    });
    expect(gateway.sales).toHaveLength(0);
  });

  it("accepts a stored successful sale without calling the gateway", async () => {
    const { orchestrator, gateway } = setup();

    const result = await orchestrator.authorize({
      id: "sess_1",
      netvalve_sale_success: true,
      netvalve_transaction_id: "555000",
    });

    expect(result).toMatchObject({
      status: "authorized",
      path: "stored_sale",
      sale: null,
      data: {
        id: "sess_1",
        status: "authorized",
        requires_payment_input: false,
        payment_type: "card",
        authorized_at: "2026-03-01T12:00:00.000Z",
      },
    });
    expect(gateway.sales).toHaveLength(0);
  });

  it("runs a CARD sale after hosted fields complete", async () => {
    const { orchestrator, gateway, publicIp } = setup();

    const result = await orchestrator.authorize({
      id: "sess_2",
      hpf_completed: true,
      hpf_payment_token: "hpf_tok",
      amount: 49.999,
      currency_code: "eur",
      cart_id: "cart_7",
      order_description: "Two mugs!",
      customer_email: "buyer@example.com",
      client_ip_address: "127.0.0.1",
    });

    expect(gateway.sales).toEqual([
      {
        amount: 50,
        currency: "EUR",
        paymentType: "CARD",
        paymentToken: "hpf_tok",
        clientOrderId: "cart_7",
        orderDesc: "Two mugs",
        siteId: "site-1",
        netvalveMidId: "mid-eur",
        customerIp: "198.51.100.20",
        customerEmail: "buyer@example.com",
      },
    ]);
    expect(publicIp.calls).toBe(1);
    expect(result.status).toBe("authorized");
    if (result.status !== "authorized") {
      return;
    }
    expect(result.path).toBe("hosted_fields_sale");
    expect(result.data).toMatchObject({
      status: "authorized",
      payment_flow: "hpf",
      transaction_id: "555001",
      netvalve_transaction_id: "555001",
      netvalve_order_id: "nv_order_1",
      netvalve_sale_attempted: true,
      netvalve_sale_success: true,
      card_number: "411111******1111",
      card_type: "VISA",
      mid_id: "mid-eur",
    });
  });

  it("runs the CARD sale for completed hosted fields even when a transaction id is present", async () => {
    const { orchestrator, gateway } = setup();

    const result = await orchestrator.authorize({
      id: "sess_8",
      hpf_completed: true,
      hpf_payment_token: "hpf_tok",
      transaction_id: "ext_1",
      amount: 12,
    });

    expect(gateway.sales).toHaveLength(1);
    expect(result.status === "authorized" ? result.path : null).toBe("hosted_fields_sale");
    expect(result.data.transaction_id).toBe("555001");
  });

  it("returns the whole session when authorized data is submitted again", async () => {
    const { orchestrator, gateway, clock } = setup();
    const first = await orchestrator.authorize(
      parseCheckoutSessionData({
        id: "sess_9",
        hpf_completed: true,
        hpf_payment_token: "hpf_tok",
        amount: 20,
        netvalve_flow: "hpf",
        hpf_jwt_token: "jwt-1",
      }),
    );
    clock.setNow("2026-03-01T12:05:00.000Z");

    const second = await orchestrator.authorize(parseCheckoutSessionData({ data: first.data }));

    expect(gateway.sales).toHaveLength(1);
    expect(second.status === "authorized" ? second.path : null).toBe("stored_sale");
    expect(second.data).toMatchObject({
      netvalve_flow: "hpf",
      hpf_jwt_token: "jwt-1",
      netvalve_order_id: "nv_order_1",
      netvalve_response_code: "GTW_1000",
      card_number: "411111******1111",
      card_type: "VISA",
      mid_id: "mid-usd",
      site_id: "site-1",
      payment_flow: "hpf",
      authorized_at: "2026-03-01T12:00:00.000Z",
    });
  });

  it("runs a TOKEN sale for a storefront token that differs from the hosted-fields token", async () => {
    const { orchestrator, gateway, publicIp } = setup();

    const result = await orchestrator.authorize({
      id: "sess_3",
      netvalve_token: "nv_tok",
      hpf_payment_token: "other",
      amount: 10,
      client_ip_address: "203.0.113.9",
    });

    expect(result.status === "authorized" ? result.path : null).toBe("token_sale");
    expect(gateway.sales[0]).toMatchObject({ paymentType: "TOKEN", paymentToken: "nv_tok", customerIp: "203.0.113.9" });
    expect(publicIp.calls).toBe(0);
    expect(result.data.payment_flow).toBeUndefined();
  });

  it("accepts external proof when the token equals the hosted-fields token", async () => {
    const { orchestrator, gateway } = setup();

    const result = await orchestrator.authorize({
      id: "sess_4",
      netvalve_token: "same",
      hpf_payment_token: "same",
      order_id: "order_1",
    });

    expect(result.status === "authorized" ? result.path : null).toBe("external_proof");
    expect(gateway.sales).toHaveLength(0);
  });

  it("authorizes locally on a transaction id alone", async () => {
    const { orchestrator, gateway } = setup();

    const result = await orchestrator.authorize({ id: "sess_10", transaction_id: "tx_1" });

    expect(result).toMatchObject({
      status: "authorized",
      path: "external_proof",
      sale: null,
      data: { id: "sess_10", transaction_id: "tx_1", status: "authorized" },
    });
    expect(gateway.sales).toHaveLength(0);
  });

  it("refuses a session whose only proof is a client flag", async () => {
    const { orchestrator } = setup();

    const result = await orchestrator.authorize({ id: "sess_5", card_form_submitted: true });

    expect(result).toEqual({
      status: "requires_more",
      reason: "unverified",
      data: {
        id: "sess_5",
        card_form_submitted: true,
        status: "requires_more",
        requires_payment_input: true,
        error_message: UNVERIFIED_PAYMENT_MESSAGE,
      },
    });
  });

  it("declines when the bank reports a decline code despite an approval code", async () => {
    const { orchestrator, gateway } = setup();
    gateway.saleResult = {
      ok: true,
      value: {
        httpStatus: 200,
        body: { responseCode: "GTW_1000", responseMessage: "Approved", transactionID: 9, bankResponseCode: "51" },
      },
    };

    const result = await orchestrator.authorize({ id: "sess_6", hpf_completed: true, hpf_payment_token: "tok" });

    expect(result.status).toBe("declined");
    expect(result.data).toMatchObject({
      status: "requires_more",
      requires_payment_input: true,
      netvalve_sale_success: false,
      netvalve_decline_reason: "Insufficient funds",
      error_message: "Payment declined (Insufficient funds). Please try a different card.",
    });
    expect(result.data.transaction_id).toBeUndefined();
    expect(result.data.netvalve_transaction_id).toBeUndefined();
  });

  it("reports a transport failure as an error", async () => {
    const { orchestrator, gateway } = setup();
    gateway.saleResult = { ok: false, failure: { kind: "transport_error", message: "ECONNRESET" } };

    const result = await orchestrator.authorize({ id: "sess_7", hpf_completed: true, hpf_payment_token: "tok" });

    expect(result.status).toBe("error");
    expect(result.data.error_message).toBe(
      "Payment could not be completed (Network error: ECONNRESET). Please try a different card.",
    );
  });

  it("fails a sale without any payment token", async () => {
    const { orchestrator, gateway } = setup();

    const sale = await orchestrator.executeSale({ amount: 5 }, "CARD");

    expect(sale.failure).toBe("missing_token");
    expect(sale.responseMessage).toBe("No payment token available");
    expect(sale.request.clientOrderId).toBe("order_1772366400");
    expect(gateway.sales).toHaveLength(0);
  });

  it("detects authorization proof from flags and identifiers", () => {
    expect(hasAuthorizationProof({ is_authorized: true })).toBe(true);
    expect(hasAuthorizationProof({ checkout_id: "chk_1" })).toBe(true);
    expect(hasAuthorizationProof({ checkout_id: "  ", authorized: false })).toBe(false);
  });
});

describe("GatewayFundOperations", () => {
  it("short-circuits a capture that already happened", async () => {
    const gateway = new FakeCardGateway();
    const operations = new GatewayFundOperations(gateway, testLogger);

    expect(await operations.capture({ transactionId: "555001", amount: 10, alreadyCaptured: true })).toEqual({
      status: "captured",
      transactionId: "555001",
      data: {},
    });
    expect(gateway.operations).toHaveLength(0);
  });

  it("captures with a numeric transaction id and rounded amount", async () => {
    const gateway = new FakeCardGateway();
    const operations = new GatewayFundOperations(gateway, testLogger);

    const result = await operations.capture({ transactionId: "555001", amount: 10.004 });

    expect(gateway.operations).toEqual([{ operation: "capture", body: { transactionID: 555001, amount: 10 } }]);
    expect(result).toEqual({
      status: "captured",
      transactionId: "555001",
      data: { responseCode: "GTW_1000", responseMessage: "Approved" },
      responseCode: "GTW_1000",
      responseMessage: "Approved",
    });
  });

  it("reports the refunded amount", async () => {
    const operations = new GatewayFundOperations(new FakeCardGateway(), testLogger);

    expect((await operations.refund({ transactionId: "7", amount: 3.5 })).refundedAmount).toBe(3.5);
  });

  it("cancels without an amount", async () => {
    const gateway = new FakeCardGateway();
    await new GatewayFundOperations(gateway, testLogger).cancel({ transactionId: "8" });

    expect(gateway.operations).toEqual([{ operation: "cancel", body: { transactionID: 8 } }]);
  });

  it("rejects non-numeric transaction ids without calling the gateway", async () => {
    const gateway = new FakeCardGateway();
    const result = await new GatewayFundOperations(gateway, testLogger).refund({ transactionId: "tx-abc", amount: 1 });

    expect(result).toEqual({
      status: "refund_error",
      transactionId: "tx-abc",
      data: {},
      error: "Transaction id 'tx-abc' is not numeric",
    });
    expect(gateway.operations).toHaveLength(0);
  });

  it("maps gateway server errors to an error status", async () => {
    const gateway = new FakeCardGateway();
    gateway.operationResult = { ok: true, value: { httpStatus: 503, body: {} } };

    const result = await new GatewayFundOperations(gateway, testLogger).cancel({ transactionId: "8" });

    expect(result).toEqual({
      status: "cancel_error",
      transactionId: "8",
      data: {},
      error: "Gateway returned HTTP 503",
    });
  });
});
