import { afterEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import type { GatewayConfig } from "../src/infra/config.js";
import { buildApp } from "../src/server.js";
import type { PublicIpResolverPort } from "../src/ports/public-ip.js";
import {
  MutableClock,
  ScriptedHttpClient,
  gatewayConfig,
  jsonResponse,
  runtimeConfig,
  testLogger,
  textResponse,
} from "./support.js";

const publicIp: PublicIpResolverPort = {
  async resolve() {
    return "198.51.100.20";
  },
};

describe("Gateway API", () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    if (app) {
      await app.close();
      app = undefined;
    }
  });

  function start(http: ScriptedHttpClient, gateway: Partial<GatewayConfig> = {}) {
    app = buildApp(runtimeConfig({ gateway: gatewayConfig(gateway) }), {
      logger: testLogger,
      clock: new MutableClock("2026-03-01T12:00:00.000Z"),
      httpClient: http,
      publicIp,
    });
    return app;
  }

  it("returns a static hosted-fields session with a session patch", async () => {
    const app = start(new ScriptedHttpClient(), { hostedFieldsScriptSrc: "https://cdn.test/static.js" });

    const response = await app.inject({ method: "GET", url: "/v1/netvalve/hpf/session?currency_code=eur" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      provider: "netvalve",
      environment: "sandbox",
      currency_code: "EUR",
      site_id: "site-1",
      client_id: "test-client",
      netvalve_mid_id: "mid-eur",
      flow: "hpf",
      source: "static_override",
      hpf: {
        script_src: "https://cdn.test/static.js",
        integrity: null,
        version: null,
        payment_token: null,
        jwt_token: null,
        trace_id: null,
        script_id: null,
      },
      payment_session_patch: { netvalve_flow: "hpf", hpf_script_src: "https://cdn.test/static.js" },
    });
  });

  it("answers 502 with a diagnostic when no session source works", async () => {
    const http = new ScriptedHttpClient().on(
      "GET",
      "https://payments.test/hpf/initializeSession",
      textResponse(503, "maintenance"),
    );
    const app = start(http);

    const response = await app.inject({ method: "POST", url: "/v1/netvalve/hpf/session", payload: { amount: 10 } });

    expect(response.statusCode).toBe(502);
    const body = response.json();
    expect(body.message).toBe("Card payment session could not be initialized.");
    expect(body.diagnostic).toContain("SESSION: initializeSession returned HTTP 503");
    expect(body.debug).toEqual({
      backoffice_token_obtained: false,
      hpf_script_found: false,
      hpp_fallback: { success: false, reason: "hpp_fallback_no_bearer_token", attempts: [] },
    });
  });

  it("authorizes a completed hosted-fields payment through a sale", async () => {
    const http = new ScriptedHttpClient().on(
      "POST",
      "https://payments.test/sale",
      jsonResponse(200, {
        responseCode: "GTW_1000",
        responseMessage: "Approved",
        transactionID: 777,
        bankResponseCode: "BNK_2000",
      }),
    );
    const app = start(http);

    const response = await app.inject({
      method: "POST",
      url: "/v1/netvalve/payment",
      payload: { data: { id: "sess_1", hpf_completed: true, hpfPaymentToken: "hpf_tok", amount: 20, ipAddress: "203.0.113.9" } },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body).toMatchObject({
      status: "authorized",
      outcome: "authorized",
      path: "hosted_fields_sale",
      data: { id: "sess_1", transaction_id: "777", payment_flow: "hpf", authorized_at: "2026-03-01T12:00:00.000Z" },
    });
    expect(http.requestsTo("https://payments.test/sale")[0]?.json).toMatchObject({
      paymentType: "CARD",
      paymentToken: "hpf_tok",
      customerIp: "203.0.113.9",
      clientOrderId: "sess_1",
    });
  });

  it("asks for card details when a payment has no proof", async () => {
    const app = start(new ScriptedHttpClient());

    const response = await app.inject({ method: "POST", url: "/v1/netvalve/payment", payload: { id: "sess_2" } });

    expect(response.json()).toMatchObject({
      status: "requires_more",
      outcome: "requires_more",
      reason: "card_input_required",
      data: { id: "sess_2", requires_payment_input: true },
    });
  });

  it("requires a capture amount unless the payment was already captured", async () => {
    const app = start(new ScriptedHttpClient());

    const missing = await app.inject({
      method: "POST",
      url: "/v1/netvalve/capture",
      payload: { transaction_id: "555001" },
    });
    expect(missing.statusCode).toBe(422);
    expect(missing.json().error.code).toBe("invalid_amount");

    const captured = await app.inject({
      method: "POST",
      url: "/v1/netvalve/capture",
      payload: { transaction_id: "555001", already_captured: true },
    });
    expect(captured.json()).toEqual({ status: "captured", transaction_id: "555001", data: {} });
  });

  it("refunds through the gateway", async () => {
    const http = new ScriptedHttpClient().on(
      "POST",
      "https://payments.test/refund",
      jsonResponse(200, { responseCode: "GTW_1000" }),
    );
    const app = start(http);

    const response = await app.inject({
      method: "POST",
      url: "/v1/netvalve/refund",
      payload: { transaction_id: "7", amount: 2.5 },
    });

    expect(response.json()).toEqual({
      status: "refunded",
      transaction_id: "7",
      data: { responseCode: "GTW_1000" },
      response_code: "GTW_1000",
      refunded_amount: 2.5,
    });
    expect(http.requests[0]?.json).toEqual({ transactionID: 7, amount: 2.5 });
  });

  it("classifies gateway webhooks and normalizes status lookups", async () => {
    const app = start(new ScriptedHttpClient());

    const webhook = await app.inject({
      method: "POST",
      url: "/v1/netvalve/webhook",
      payload: { type: "payment.captured", session_id: "sess_1", amount: 10 },
    });
    expect(webhook.json()).toEqual({ action: "SUCCESSFUL", data: { session_id: "sess_1", amount: 10 } });

    const status = await app.inject({ method: "GET", url: "/v1/netvalve/status?status=AUTHORIZED&transaction_id=123" });
    expect(status.json()).toEqual({ status: "authorized", transaction_id: "123" });
  });
});
