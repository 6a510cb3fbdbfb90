import type { ClockPort } from "../src/infra/clock.js";
import type { GatewayConfig, RuntimeConfig } from "../src/infra/config.js";
import { silentLogger } from "../src/infra/logger.js";
import type { AlertNotifierPort, CriticalAlert } from "../src/ports/alert-notifier.js";
import type { HttpClientPort, HttpMethod, HttpRequest, HttpResponse } from "../src/ports/http-client.js";
import type { TokenCachePort } from "../src/ports/token-cache.js";

export const testLogger = silentLogger();

export class MutableClock implements ClockPort {
  constructor(private now: string) {}

  nowIso(): string {
    return this.now;
  }

  setNow(nextNow: string): void {
    this.now = nextNow;
  }
}

export class RecordingAlerts implements AlertNotifierPort {
  readonly sent: CriticalAlert[] = [];

  async sendCriticalAlert(alert: CriticalAlert): Promise<void> {
    this.sent.push(alert);
  }
}

/** A token cache whose backend is down: every call rejects. */
export class UnavailableTokenCache implements TokenCachePort {
  calls = 0;

  async get(): Promise<string | null> {
    this.calls += 1;
    throw new Error("Redis connection is closed");
  }

  async set(): Promise<void> {
    this.calls += 1;
    throw new Error("Redis connection is closed");
  }

  async delete(): Promise<void> {
    this.calls += 1;
    throw new Error("Redis connection is closed");
  }
}

type ScriptedReply = HttpResponse | Error | ((request: HttpRequest) => HttpResponse | Promise<HttpResponse>);

export function jsonResponse(status: number, body: unknown): HttpResponse {
  return { status, contentType: "application/json", text: JSON.stringify(body) };
}

export function textResponse(status: number, text: string, contentType = "text/plain"): HttpResponse {
  return { status, contentType, text };
}

/** Answers by exact method and URL; several replies for one route are served in order, the last one repeats. */
export class ScriptedHttpClient implements HttpClientPort {
  readonly requests: HttpRequest[] = [];
  private readonly routes = new Map<string, ScriptedReply[]>();

  on(method: HttpMethod, url: string, ...replies: ScriptedReply[]): this {
    this.routes.set(`${method} ${url}`, replies);
    return this;
  }

  requestsTo(url: string): HttpRequest[] {
    return this.requests.filter((request) => request.url === url);
  }

  async request(input: HttpRequest): Promise<HttpResponse> {
    this.requests.push(input);
    const replies = this.routes.get(`${input.method} ${input.url}`);
    const reply = replies && replies.length > 1 ? replies.shift() : replies?.[0];
    if (reply === undefined) {
      throw new Error(`unexpected request ${input.method} ${input.url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === "function" ? reply(input) : reply;
  }
}

export function gatewayConfig(overrides: Partial<GatewayConfig> = {}): GatewayConfig {
  return {
    environment: "sandbox",
    clientId: "test-client",
    apiKey: "test-api-key",
    siteId: "site-1",
    midIds: { USD: "mid-usd", EUR: "mid-eur" },
    paymentApiUrl: "https://payments.test",
    backofficeApiUrl: "https://backoffice.test",
    hostedPageBaseUrl: "https://hpp.test",
    hostedPageFallbackEnabled: true,
    hostedPageMode: "SALE",
    hostedPageReturnUrls: {},
    returnBaseUrl: "https://shop.test",
    ...overrides,
  };
}

export function runtimeConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    host: "127.0.0.1",
    port: 8080,
    environment: "development",
    logLevel: "silent",
    operatorApiKeys: ["test-operator-key"],
    metricsEnabled: true,
    eventStoreBackend: "memory",
    tokenCacheBackend: "memory",
    redisKeyPrefix: "payhook",
    corsOrigins: [],
    fulfillment: {
      baseUrl: "https://fulfillment.test",
      adminEmail: "ops@example.com",
      adminPassword: "test-password",
      publishableKey: "pk_test",
      tokenTtlSeconds: 82_800,
      requestTimeoutMs: 30_000,
    },
    gateway: gatewayConfig(),
    ...overrides,
  };
}
