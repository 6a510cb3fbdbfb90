import { pino } from "pino";
import { describe, expect, it } from "vitest";
import { buildSlackAlertPayload, SlackAlertNotifier } from "../src/adapters/alerts/slack-alert-notifier.js";
import { buildUrl } from "../src/adapters/http/fetch-http-client.js";
import { HttpPublicIpResolver } from "../src/adapters/http/public-ip-resolver.js";
import { LoggingAlertNotifier } from "../src/adapters/inmemory/alert-notifier.js";
import { InMemoryTokenCache } from "../src/adapters/inmemory/token-cache.js";
import { isUniqueViolation } from "../src/adapters/postgres/event-store.js";
import { RedisTokenCache, type RedisTokenClient } from "../src/adapters/redis/token-cache.js";
import { maskToken } from "../src/infra/logger.js";
import { ServiceMetricsRegistry } from "../src/infra/metrics.js";
import { getOrRefresh } from "../src/infra/token-refresh.js";
import {
  MutableClock,
  ScriptedHttpClient,
  UnavailableTokenCache,
  jsonResponse,
  testLogger,
  textResponse,
} from "./support.js";

class FakeRedis implements RedisTokenClient {
  readonly values = new Map<string, { value: string; ttlMs: number }>();

  async get(key: string): Promise<string | null> {
    return this.values.get(key)?.value ?? null;
  }

  async set(key: string, value: string, _mode: "PX", ttlMs: number): Promise<unknown> {
    this.values.set(key, { value, ttlMs });
    return "OK";
  }

  async del(key: string): Promise<number> {
    return this.values.delete(key) ? 1 : 0;
  }
}

describe("token caches", () => {
  it("expires in-memory entries at their deadline", async () => {
    const clock = new MutableClock("2026-03-01T12:00:00.000Z");
    const cache = new InMemoryTokenCache(clock);
    await cache.set("k", "v", 1_000);

    clock.setNow("2026-03-01T12:00:00.999Z");
    expect(await cache.get("k")).toBe("v");
    clock.setNow("2026-03-01T12:00:01.000Z");
    expect(await cache.get("k")).toBeNull();
  });

  it("namespaces redis keys and stores a millisecond ttl", async () => {
    const redis = new FakeRedis();
    const cache = new RedisTokenCache(redis, "payhook");

    await cache.set("netvalve:backoffice_token", "bo-token", 3_300_000.7);

    expect(redis.values.get("payhook:token:netvalve:backoffice_token")).toEqual({
      value: "bo-token",
      ttlMs: 3_300_000,
    });
    expect(await cache.get("netvalve:backoffice_token")).toBe("bo-token");
    await cache.delete("netvalve:backoffice_token");
    expect(await cache.get("netvalve:backoffice_token")).toBeNull();
  });

  it("refreshes only on a miss and skips caching a non-positive ttl", async () => {
    const cache = new InMemoryTokenCache(new MutableClock("2026-03-01T12:00:00.000Z"));
    let refreshes = 0;
    const refresh = async () => {
      refreshes += 1;
      return { value: `token-${refreshes}`, ttlMs: 60_000 };
    };

    expect(await getOrRefresh(cache, "a", refresh, testLogger)).toBe("token-1");
    expect(await getOrRefresh(cache, "a", refresh, testLogger)).toBe("token-1");
    expect(refreshes).toBe(1);

    expect(await getOrRefresh(cache, "b", async () => ({ value: "short", ttlMs: -5 }), testLogger)).toBe("short");
    expect(await cache.get("b")).toBeNull();
    expect(await getOrRefresh(cache, "c", async () => null, testLogger)).toBeNull();
  });

  it("refreshes through an unavailable cache instead of failing", async () => {
    const cache = new UnavailableTokenCache();

    const value = await getOrRefresh(cache, "a", async () => ({ value: "fresh", ttlMs: 60_000 }), testLogger);

    expect(value).toBe("fresh");
    expect(cache.calls).toBe(2);
  });
});

describe("HttpPublicIpResolver", () => {
  it("skips endpoints that fail or return something other than an IPv4 address", async () => {
    const http = new ScriptedHttpClient()
      .on("GET", "https://api.ipify.org", new Error("ENOTFOUND"))
      .on("GET", "https://ifconfig.me/ip", textResponse(200, "<html>captcha</html>"))
      .on("GET", "https://icanhazip.com", textResponse(200, "203.0.113.50\n"));
    const cache = new InMemoryTokenCache(new MutableClock("2026-03-01T12:00:00.000Z"));
    const resolver = new HttpPublicIpResolver(http, cache, testLogger);

    expect(await resolver.resolve()).toBe("203.0.113.50");
    expect(await resolver.resolve()).toBe("203.0.113.50");
    expect(http.requests).toHaveLength(3);
    expect(await cache.get("public_ip")).toBe("203.0.113.50");
  });

  it("returns null when every lookup fails", async () => {
    const http = new ScriptedHttpClient()
      .on("GET", "https://api.ipify.org", textResponse(500, ""))
      .on("GET", "https://ifconfig.me/ip", textResponse(200, "::1"))
      .on("GET", "https://icanhazip.com", textResponse(200, "999.1.1.1"));
    const resolver = new HttpPublicIpResolver(
      http,
      new InMemoryTokenCache(new MutableClock("2026-03-01T12:00:00.000Z")),
      testLogger,
    );

    expect(await resolver.resolve()).toBeNull();
  });

  it("still resolves the address while the cache is unavailable", async () => {
    const http = new ScriptedHttpClient().on("GET", "https://api.ipify.org", textResponse(200, "203.0.113.7"));
    const resolver = new HttpPublicIpResolver(http, new UnavailableTokenCache(), testLogger);

    expect(await resolver.resolve()).toBe("203.0.113.7");
  });
});

describe("LoggingAlertNotifier", () => {
  it("writes each alert to the error log", async () => {
    const lines: string[] = [];
    const logger = pino({ level: "info", base: null, timestamp: false }, { write: (line: string) => lines.push(line) });

    await new LoggingAlertNotifier(logger).sendCriticalAlert({
      title: "Webhook processing failed",
      message: "solidgate event sg-1 failed",
      platform: "solidgate",
    });

    expect(lines.map((line) => JSON.parse(line))).toEqual([
      { level: 50, title: "Webhook processing failed", platform: "solidgate", msg: "solidgate event sg-1 failed" },
    ]);
  });
});

describe("SlackAlertNotifier", () => {
  it("builds a critical alert attachment", () => {
    const payload = buildSlackAlertPayload(
      { title: "Webhook processing failed", message: "solidgate event sg-1 failed" },
      "production",
      "2026-03-01T12:00:00.000Z",
    );

    expect(payload).toEqual({
      attachments: [
        {
          color: "#E01E5A",
          blocks: [
            {
              type: "header",
              text: { type: "plain_text", text: "🚨  Webhook processing failed", emoji: true },
            },
            { type: "section", text: { type: "mrkdwn", text: "solidgate event sg-1 failed" } },
            {
              type: "section",
              fields: [
                { type: "mrkdwn", text: "*Severity:*\nCRITICAL" },
                { type: "mrkdwn", text: "*Environment:*\nproduction" },
                { type: "mrkdwn", text: "*Platform:*\ngeneral" },
                { type: "mrkdwn", text: "*Timestamp:*\n2026-03-01T12:00:00.000Z" },
              ],
            },
          ],
        },
      ],
    });
  });

  it("posts to the webhook and never rejects", async () => {
    const http = new ScriptedHttpClient().on(
      "POST",
      "https://hooks.slack.test/services/test",
      jsonResponse(200, {}),
      new Error("ECONNRESET"),
    );
    const notifier = new SlackAlertNotifier(http, new MutableClock("2026-03-01T12:00:00.000Z"), testLogger, {
      webhookUrl: "https://hooks.slack.test/services/test",
      environment: "staging",
    });

    await notifier.sendCriticalAlert({ title: "t", message: "m", platform: "ordergroove" });
    await expect(notifier.sendCriticalAlert({ title: "t", message: "m" })).resolves.toBeUndefined();
    expect(http.requests).toHaveLength(2);
    expect(http.requests[0]?.timeoutMs).toBe(5000);
  });
});

describe("infrastructure helpers", () => {
  it("appends query parameters to request URLs", () => {
    expect(buildUrl("https://fulfillment.test/store/carts/c1", { fields: "+payment_collection" })).toBe(
      "https://fulfillment.test/store/carts/c1?fields=%2Bpayment_collection",
    );
    expect(buildUrl("https://fulfillment.test/admin/payments")).toBe("https://fulfillment.test/admin/payments");
  });

  it("recognizes unique constraint violations", () => {
    expect(isUniqueViolation({ code: "23505" })).toBe(true);
    expect(isUniqueViolation(new Error("boom"))).toBe(false);
  });

  it("renders counters and histogram buckets in Prometheus text format", () => {
    const metrics = new ServiceMetricsRegistry();
    metrics.recordHttpRequest("get", "/v1/netvalve/status", 200, 0.02);
    metrics.recordHttpRequest("GET", "/v1/netvalve/status", 200, 0.2);

    const lines = metrics.renderPrometheus().split("\n");

    expect(lines).toContain('payhook_http_requests_total{method="GET",route="/v1/netvalve/status",status_code="200"} 2');
    expect(lines).toContain('payhook_http_request_duration_seconds_bucket{method="GET",route="/v1/netvalve/status",le="0.01"} 0');
    expect(lines).toContain('payhook_http_request_duration_seconds_bucket{method="GET",route="/v1/netvalve/status",le="0.025"} 1');
    expect(lines).toContain('payhook_http_request_duration_seconds_bucket{method="GET",route="/v1/netvalve/status",le="+Inf"} 2');
    expect(lines).toContain('payhook_http_request_duration_seconds_count{method="GET",route="/v1/netvalve/status"} 2');
  });

  it("masks long tokens in logs", () => {
    expect(maskToken("abcdefghijklmnop")).toBe("abcdefghijkl...");
    expect(maskToken("short")).toBe("short");
  });
});
