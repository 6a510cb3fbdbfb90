import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";
import { Redis } from "ioredis";
import { Pool } from "pg";
import type { Logger } from "pino";
import { GatewayAuthorizationOrchestrator } from "./application/gateway-authorization-orchestrator.js";
import { GatewayFundOperations } from "./application/gateway-fund-operations.js";
import { GatewaySessionOrchestrator } from "./application/gateway-session-orchestrator.js";
import { IdempotencyCoordinator } from "./application/idempotency-coordinator.js";
import { SettlementService } from "./application/settlement-service.js";
import {
  WebhookIntakeService,
  type IntakeResult,
  type SettlementWebhookResult,
} from "./application/webhook-intake-service.js";
import { SlackAlertNotifier } from "./adapters/alerts/slack-alert-notifier.js";
import { HttpFulfillmentBackend } from "./adapters/fulfillment/http-fulfillment-backend.js";
import { FetchHttpClient } from "./adapters/http/fetch-http-client.js";
import { HttpPublicIpResolver } from "./adapters/http/public-ip-resolver.js";
import { LoggingAlertNotifier } from "./adapters/inmemory/alert-notifier.js";
import { InMemoryEventStore } from "./adapters/inmemory/event-store.js";
import { InMemoryTokenCache } from "./adapters/inmemory/token-cache.js";
import { NetvalveGateway } from "./adapters/netvalve/netvalve-gateway.js";
import { PostgresEventStore } from "./adapters/postgres/event-store.js";
import { RedisTokenCache } from "./adapters/redis/token-cache.js";
import {
  INTERNAL_ERROR_CODE,
  INVALID_XML_ERROR_CODE,
  buildOrderErrorXml,
  buildOrderSuccessXml,
  extractXmlDocument,
  parseOrderPlacementXml,
  type OrderPlacement,
} from "./api/ordergroove-xml.js";
import { presentAuthorization, presentFundOperation, presentSession } from "./api/presenters.js";
import {
  assertJsonObject,
  normalizeLimit,
  normalizePaymentStatus,
  normalizeResourceId,
  parseCheckoutSessionData,
  parseFundOperationInput,
  parseSessionRequest,
  requireHeader,
} from "./api/validators.js";
import { classifyGatewayWebhook } from "./domain/webhook-action.js";
import { readText } from "./domain/sale-response.js";
import { AppError, WebhookProcessingError } from "./infra/app-error.js";
import { SystemClock, epochMillis, type ClockPort } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { createLogger } from "./infra/logger.js";
import { ServiceMetricsRegistry } from "./infra/metrics.js";
import type { AlertNotifierPort } from "./ports/alert-notifier.js";
import type { CardGatewayPort } from "./ports/card-gateway.js";
import type { EventStorePort } from "./ports/event-store.js";
import type { FulfillmentBackendPort } from "./ports/fulfillment-backend.js";
import type { HttpClientPort } from "./ports/http-client.js";
import type { PublicIpResolverPort } from "./ports/public-ip.js";
import type { TokenCachePort } from "./ports/token-cache.js";

export interface AppDependencies {
  logger?: Logger;
  clock?: ClockPort;
  httpClient?: HttpClientPort;
  eventStore?: EventStorePort;
  tokenCache?: TokenCachePort;
  alerts?: AlertNotifierPort;
  gateway?: CardGatewayPort;
  fulfillment?: FulfillmentBackendPort;
  publicIp?: PublicIpResolverPort;
}

function requireBearerApiKey(headers: Record<string, unknown>, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "invalid_api_key", "Invalid API key.");
  }

  return token;
}

function admissionLabel(result: IntakeResult<unknown>): string {
  return result.outcome === "skipped" ? `skipped_${result.reason}` : result.outcome;
}

function createEventStore(
  config: RuntimeConfig,
  clock: ClockPort,
  closeActions: Array<() => Promise<void>>,
): EventStorePort {
  if (config.eventStoreBackend !== "postgres" || !config.postgresUrl) {
    return new InMemoryEventStore(clock);
  }
  const pool = new Pool({ connectionString: config.postgresUrl });
  closeActions.push(async () => {
    await pool.end();
  });
  return new PostgresEventStore(pool);
}

function createTokenCache(
  config: RuntimeConfig,
  clock: ClockPort,
  closeActions: Array<() => Promise<void>>,
): TokenCachePort {
  if (config.tokenCacheBackend !== "redis" || !config.redisUrl) {
    return new InMemoryTokenCache(clock);
  }
  const redisClient = new Redis(config.redisUrl, {
    lazyConnect: false,
    maxRetriesPerRequest: 1,
  });
  closeActions.push(async () => {
    await redisClient.quit();
  });
  return new RedisTokenCache(redisClient, config.redisKeyPrefix);
}

export function buildApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  dependencies: AppDependencies = {},
): FastifyInstance {
  const app = Fastify({ logger: false });
  const logger = dependencies.logger ?? createLogger({ level: config.logLevel, environment: config.environment });
  const metrics = new ServiceMetricsRegistry();
  const operatorApiKeys = new Set<string>(config.operatorApiKeys);
  const requestStartTimes = new WeakMap<FastifyRequest, bigint>();
  const closeActions: Array<() => Promise<void>> = [];

  const clock = dependencies.clock ?? new SystemClock();
  const httpClient = dependencies.httpClient ?? new FetchHttpClient();

  const eventStore = dependencies.eventStore ?? createEventStore(config, clock, closeActions);
  const tokenCache = dependencies.tokenCache ?? createTokenCache(config, clock, closeActions);

  const alerts =
    dependencies.alerts
    ?? (config.slackAlertsUrl
      ? new SlackAlertNotifier(httpClient, clock, logger, {
        webhookUrl: config.slackAlertsUrl,
        environment: config.environment,
      })
      : new LoggingAlertNotifier(logger));
  const gateway = dependencies.gateway ?? new NetvalveGateway(httpClient, config.gateway, logger);
  const fulfillment =
    dependencies.fulfillment ?? new HttpFulfillmentBackend(httpClient, tokenCache, config.fulfillment, logger);
  const publicIp = dependencies.publicIp ?? new HttpPublicIpResolver(httpClient, tokenCache, logger);

  const intake = new WebhookIntakeService(
    new IdempotencyCoordinator(eventStore, logger),
    new SettlementService(fulfillment, config.fulfillment.publishableKey, logger),
    alerts,
    logger,
  );
  const sessions = new GatewaySessionOrchestrator(gateway, config.gateway, tokenCache, clock, logger);
  const authorizations = new GatewayAuthorizationOrchestrator(gateway, config.gateway, publicIp, clock, logger);
  const fundOperations = new GatewayFundOperations(gateway, logger);

  for (const contentType of ["application/xml", "text/xml"]) {
    app.addContentTypeParser(contentType, { parseAs: "string" }, (_request, body, done) => {
      done(null, String(body));
    });
  }
  app.addContentTypeParser("application/x-www-form-urlencoded", { parseAs: "string" }, (_request, body, done) => {
    done(null, Object.fromEntries(new URLSearchParams(String(body))));
  });

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    return reply.status(200).send({ status: "ready" });
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStartTimes.set(request, process.hrtime.bigint());
    reply.header("X-Request-Id", request.id);
    if (request.url.startsWith("/v1/webhook-events")) {
      requireBearerApiKey(request.headers, operatorApiKeys);
    }
  });

  app.addHook("onResponse", async (request, reply) => {
    const startNs = requestStartTimes.get(request);
    const durationSeconds = startNs ? Number(process.hrtime.bigint() - startNs) / 1_000_000_000 : 0;
    logger.debug(
      { method: request.method, url: request.url, statusCode: reply.statusCode, durationSeconds },
      "request completed",
    );
    if (!config.metricsEnabled) {
      return;
    }
    const route = request.routeOptions.url ?? request.url.split("?")[0] ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.post("/v1/webhooks/solidgate", async (request, reply) => {
    const eventId = requireHeader(request.headers, "solidgate-event-id");
    const eventType = requireHeader(request.headers, "solidgate-event-type");
    assertJsonObject(request.body);
    const payload = request.body;

    let result: IntakeResult<SettlementWebhookResult>;
    try {
      result = await intake.handleSettlementWebhook({ eventId, eventType, payload });
    } catch (error) {
      metrics.recordWebhookFailure("solidgate");
      throw error;
    }
    metrics.recordWebhookAdmission("solidgate", admissionLabel(result));

    if (result.outcome === "skipped") {
      return reply.status(200).send({ message: "Event already processed" });
    }
    if (result.result.kind === "settled") {
      return reply.status(200).send({
        success: true,
        message: `${result.result.settlement.cartId} successfully settled`,
        status_code: 200,
        data: null,
      });
    }
    return reply.status(200).send({ success: true, message: "Webhook processed", status_code: 200, data: payload });
  });

  app.post("/v1/ordergroove/order-placement", async (request, reply) => {
    reply.type("application/xml; charset=utf-8");
    const document = extractXmlDocument(request.body);

    let placement: OrderPlacement;
    try {
      placement = parseOrderPlacementXml(document ?? "");
    } catch (error) {
      logger.warn({ err: error }, "order placement XML rejected");
      metrics.recordWebhookAdmission("ordergroove", "invalid_xml");
      return reply.status(400).send(buildOrderErrorXml(INVALID_XML_ERROR_CODE, "Invalid XML received"));
    }

    const orderOgId = readText(placement.order, "orderOgId");
    const eventId =
      readText(placement.order, "orderPublicId")
      ?? orderOgId
      ?? `og_order_${epochMillis(clock)}`;

    try {
      const result = await intake.recordOrderPlacement({
        eventId,
        correlationId: orderOgId,
        payload: placement.payload,
      });
      metrics.recordWebhookAdmission("ordergroove", admissionLabel(result));
    } catch (error) {
      logger.error({ err: error, eventId }, "order placement processing failed");
      metrics.recordWebhookFailure("ordergroove");
      return reply.status(500).send(buildOrderErrorXml(INTERNAL_ERROR_CODE, "Order placement could not be processed"));
    }
    return reply.status(200).send(buildOrderSuccessXml(orderOgId ?? eventId));
  });

  const initializeSession = async (input: unknown) => {
    const result = await sessions.initialize(parseSessionRequest(input));
    if (result.ok) {
      metrics.recordSession(result.flow, result.source);
    } else {
      metrics.recordSession("none", "exhausted");
    }
    return presentSession(result);
  };

  app.get("/v1/netvalve/hpf/session", async (request, reply) => {
    const presented = await initializeSession(request.query);
    return reply.status(presented.statusCode).send(presented.body);
  });

  app.post("/v1/netvalve/hpf/session", async (request, reply) => {
    const presented = await initializeSession(request.body);
    return reply.status(presented.statusCode).send(presented.body);
  });

  app.post("/v1/netvalve/payment", async (request, reply) => {
    const data = parseCheckoutSessionData(request.body);
    const result = await authorizations.authorize(data);
    metrics.recordAuthorization(result.status, "path" in result ? result.path : result.reason);
    return reply.status(200).send(presentAuthorization(result));
  });

  app.post("/v1/netvalve/capture", async (request, reply) => {
    const input = parseFundOperationInput(request.body, { requireAmount: false });
    if (!input.alreadyCaptured && input.amount <= 0) {
      throw new AppError(422, "invalid_amount", "amount must be greater than zero.");
    }
    const result = await fundOperations.capture(input);
    metrics.recordFundOperation(result.status);
    return reply.status(200).send(presentFundOperation(result));
  });

  app.post("/v1/netvalve/refund", async (request, reply) => {
    const input = parseFundOperationInput(request.body, { requireAmount: true });
    const result = await fundOperations.refund(input);
    metrics.recordFundOperation(result.status);
    return reply.status(200).send(presentFundOperation(result));
  });

  app.post("/v1/netvalve/cancel", async (request, reply) => {
    const input = parseFundOperationInput(request.body, { requireAmount: false });
    const result = await fundOperations.cancel(input);
    metrics.recordFundOperation(result.status);
    return reply.status(200).send(presentFundOperation(result));
  });

  app.post("/v1/netvalve/webhook", async (request, reply) => {
    assertJsonObject(request.body);
    const classification = classifyGatewayWebhook(request.body);
    logger.info({ action: classification.action }, "gateway webhook classified");
    return reply.status(200).send(classification);
  });

  app.get("/v1/netvalve/status", async (request, reply) => {
    const query = request.query;
    const source = typeof query === "object" && query !== null ? query : {};
    const status = "status" in source ? source.status : undefined;
    const transactionId = "transaction_id" in source ? source.transaction_id : undefined;
    return reply.status(200).send({
      status: normalizePaymentStatus(status),
      transaction_id: typeof transactionId === "string" && transactionId.length > 0 ? transactionId : null,
    });
  });

  app.get<{ Params: { eventId: string } }>("/v1/webhook-events/:eventId", async (request, reply) => {
    const eventId = normalizeResourceId(request.params.eventId, "eventId");
    const event = await eventStore.findByEventId(eventId);
    if (!event) {
      throw new AppError(404, "resource_not_found", "Webhook event not found.");
    }
    return reply.status(200).send(event);
  });

  app.get<{ Querystring: { correlation_id?: string; limit?: string } }>(
    "/v1/webhook-events",
    async (request, reply) => {
      const correlationId = normalizeResourceId(request.query.correlation_id, "correlation_id");
      const limit = normalizeLimit(request.query.limit, 50, 200);
      const events = await eventStore.listByCorrelationId(correlationId, limit);
      return reply.status(200).send({ data: events });
    },
  );

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (_, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
      },
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
          ...(error instanceof WebhookProcessingError ? { step: error.step } : {}),
        },
      });
    }
    if (error.validation || error.statusCode === 400 || error.statusCode === 415) {
      return reply.status(error.statusCode ?? 400).send({
        error: {
          code: "invalid_request",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    logger.error({ err: error, requestId: request.id }, "Unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  app.addHook("onClose", async () => {
    for (const closeAction of [...closeActions].reverse()) {
      await closeAction();
    }
  });

  return app;
}
