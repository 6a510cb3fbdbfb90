import type { Logger } from "pino";
import { readText } from "../domain/sale-response.js";
import { epochSeconds, type ClockPort } from "../infra/clock.js";
import { resolveMidId, type GatewayConfig, type HostedPageReturnUrls } from "../infra/config.js";
import { isRecord, parseJsonObject } from "../infra/json.js";
import { getOrRefresh } from "../infra/token-refresh.js";
import type { CardGatewayPort, GatewayFailure, HostedFieldsScript } from "../ports/card-gateway.js";
import type { TokenCachePort } from "../ports/token-cache.js";

const BACKOFFICE_TOKEN_KEY = "netvalve:backoffice_token";
const TOKEN_EXPIRY_BUFFER_SECONDS = 300;
const ATTEMPT_BODY_LIMIT = 500;
const REDIRECT_KEYS = ["redirectUrl", "redirect_url", "url", "paymentUrl", "payment_url"] as const;
const REDIRECT_CONTAINERS = ["data", "payload", "order"] as const;
const DEFAULT_ORDER_PATHS = ["/hpp/order", "/order"] as const;

export interface SessionRequest {
  currencyCode: string;
  amount?: number;
  cartId?: string;
  orderDescription?: string;
  returnUrls?: HostedPageReturnUrls;
}

export interface SessionContext {
  provider: "netvalve";
  environment: GatewayConfig["environment"];
  currency_code: string;
  site_id: string | null;
  client_id: string | null;
  netvalve_mid_id: string | null;
}

export type HostedFieldsSource = "static_override" | "session_api" | "backoffice" | "fallback";
export type HostedPageSource = "direct_override" | "hosted_page_order";

export interface HostedFieldsDetails {
  scriptSrc: string;
  integrity: string | null;
  version: string | null;
  paymentToken: string | null;
  jwtToken: string | null;
  traceId: string | null;
  scriptId: string | null;
}

export interface HostedPageAttempt {
  method: "POST";
  url: string;
  status: number;
  body: string;
}

export type HostedPageFallbackReason =
  | "hpp_fallback_disabled"
  | "hpp_fallback_no_bearer_token"
  | "hpp_fallback_missing_amount"
  | "hpp_fallback_missing_site_or_mid"
  | "hpp_fallback_no_redirect";

export interface SessionDebug {
  backofficeTokenObtained: boolean;
  hostedFieldsScriptFound: boolean;
  hostedPage: { reason: HostedPageFallbackReason; attempts: HostedPageAttempt[] };
}

export type SessionResult =
  | {
    ok: true;
    flow: "hpf";
    source: HostedFieldsSource;
    context: SessionContext;
    hostedFields: HostedFieldsDetails;
    diagnostic: string | null;
  }
  | {
    ok: true;
    flow: "hpp";
    source: HostedPageSource;
    context: SessionContext;
    redirectUrl: string;
    orderUrl: string | null;
    clientOrderId: string | null;
    diagnostic: string | null;
  }
  | { ok: false; context: SessionContext; message: string; diagnostic: string; debug: SessionDebug };

type HostedPageOutcome =
  | { ok: true; redirectUrl: string; orderUrl: string; clientOrderId: string }
  | { ok: false; reason: HostedPageFallbackReason; attempts: HostedPageAttempt[] };

interface WaterfallTrace {
  sessionFailure: string | null;
  tokenFailure: GatewayFailure | null;
  scriptFailure: string | null;
  hostedPage: HostedPageOutcome & { ok: false };
}

export const SESSION_FAILURE_MESSAGE = "Card payment session could not be initialized.";

export function selectHostedFieldsScript(scripts: HostedFieldsScript[]): HostedFieldsScript | null {
  const usable = scripts.filter(
    (script) =>
      script.status?.toUpperCase() === "ACTIVE"
      && !script.deleted
      && script.scriptSrc !== null
      && script.scriptSrc.startsWith("https://"),
  );
  const preferred = usable.find((script) => script.isDefault);
  if (preferred) {
    return preferred;
  }
  const createdAt = (script: HostedFieldsScript): number => {
    const parsed = script.createdDate ? Date.parse(script.createdDate) : Number.NaN;
    return Number.isFinite(parsed) ? parsed : 0;
  };
  return [...usable].sort((left, right) => createdAt(right) - createdAt(left))[0] ?? null;
}

export function hostedPageCandidateUrls(config: GatewayConfig): string[] {
  const hosts = [config.hostedPageOrderHost, config.hostedPageBaseUrl]
    .filter((host): host is string => Boolean(host))
    .map((host) => host.replace(/\/+$/, ""));
  const paths = [config.hostedPageOrderPath, ...DEFAULT_ORDER_PATHS]
    .filter((path): path is string => Boolean(path))
    .map((path) => (path.startsWith("/") ? path : `/${path}`));

  const urls: string[] = [];
  for (const host of hosts) {
    for (const path of paths) {
      const url = `${host}${path}`;
      if (!urls.includes(url)) {
        urls.push(url);
      }
    }
  }
  return urls;
}

export function extractRedirectUrl(body: Record<string, unknown>): string | null {
  const direct = readText(body, ...REDIRECT_KEYS);
  if (direct) {
    return direct;
  }
  for (const container of REDIRECT_CONTAINERS) {
    const nested = body[container];
    if (isRecord(nested)) {
      const found = readText(nested, ...REDIRECT_KEYS);
      if (found) {
        return found;
      }
    }
  }
  return null;
}

function describeHostedPageFailure(outcome: HostedPageOutcome & { ok: false }): string {
  if (outcome.reason === "hpp_fallback_no_bearer_token") {
    return "HPP: skipped, no backoffice token to create a hosted payment order.";
  }
  if (outcome.attempts.some((attempt) => attempt.status === 401)) {
    return "HPP: the order endpoint rejected the backoffice token (HTTP 401).";
  }
  return `HPP: ${outcome.reason}`;
}

export function buildSessionDiagnostic(trace: WaterfallTrace): string {
  const lines = [SESSION_FAILURE_MESSAGE, ""];
  if (trace.sessionFailure) {
    lines.push(`SESSION: ${trace.sessionFailure}`);
  }
  if (trace.tokenFailure) {
    lines.push(`AUTH: backoffice sign-in failed (${trace.tokenFailure.message}).`);
  } else if (trace.scriptFailure) {
    lines.push(`HPF: ${trace.scriptFailure}`);
  }
  lines.push(describeHostedPageFailure(trace.hostedPage));
  lines.push("");
  lines.push("QUICK FIX: set NETVALVE_HPF_SCRIPT_SRC to a hosted-fields script URL, or");
  lines.push("QUICK FIX: set NETVALVE_HPP_DIRECT_URL to a hosted payment page URL.");
  return lines.join("\n");
}

export class GatewaySessionOrchestrator {
  constructor(
    private readonly gateway: CardGatewayPort,
    private readonly config: GatewayConfig,
    private readonly tokenCache: TokenCachePort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
  ) {}

  async initialize(request: SessionRequest): Promise<SessionResult> {
    const context = this.buildContext(request.currencyCode);

    if (this.config.hostedPageDirectUrl) {
      return {
        ok: true,
        flow: "hpp",
        source: "direct_override",
        context,
        redirectUrl: this.config.hostedPageDirectUrl,
        orderUrl: null,
        clientOrderId: null,
        diagnostic: null,
      };
    }

    if (this.config.hostedFieldsScriptSrc) {
      return this.hostedFields(context, "static_override", {
        scriptSrc: this.config.hostedFieldsScriptSrc,
        integrity: this.config.hostedFieldsScriptIntegrity ?? null,
      });
    }

    const session = await this.gateway.initializeHostedFieldsSession();
    if (session.ok && session.value.scriptSrc) {
      return this.hostedFields(context, "session_api", {
        scriptSrc: session.value.scriptSrc,
        integrity: session.value.integrity,
        version: session.value.version,
        paymentToken: session.value.paymentToken,
        jwtToken: session.value.jwtToken,
        traceId: session.value.traceId,
      });
    }
    const sessionFailure = session.ok ? "initializeSession returned no script URL" : session.failure.message;
    this.logger.warn({ reason: sessionFailure }, "hosted-fields session API unavailable");

    const auth: { failure: GatewayFailure | null } = { failure: null };
    const accessToken = await getOrRefresh(this.tokenCache, BACKOFFICE_TOKEN_KEY, async () => {
      const signIn = await this.gateway.signInBackoffice();
      if (!signIn.ok) {
        auth.failure = signIn.failure;
        return null;
      }
      return {
        value: signIn.value.accessToken,
        ttlMs: (signIn.value.expiresInSeconds - TOKEN_EXPIRY_BUFFER_SECONDS) * 1000,
      };
    }, this.logger);

    let scriptFailure: string | null = null;
    if (accessToken) {
      const listed = await this.gateway.listHostedFieldsScripts(accessToken);
      const selected = listed.ok ? selectHostedFieldsScript(listed.value) : null;
      if (selected?.scriptSrc) {
        return this.hostedFields(context, "backoffice", {
          scriptSrc: selected.scriptSrc,
          integrity: selected.integrity,
          version: selected.clientVersion,
          scriptId: selected.id,
        });
      }
      scriptFailure = listed.ok
        ? "no active hosted-fields script is registered in the backoffice."
        : `script listing failed (${listed.failure.message}).`;
    } else {
      this.logger.warn({ reason: auth.failure?.message }, "backoffice token unavailable");
    }

    const hostedPage = await this.hostedPageFallback(request, context, accessToken);
    if (hostedPage.ok) {
      return {
        ok: true,
        flow: "hpp",
        source: "hosted_page_order",
        context,
        redirectUrl: hostedPage.redirectUrl,
        orderUrl: hostedPage.orderUrl,
        clientOrderId: hostedPage.clientOrderId,
        diagnostic: null,
      };
    }

    const diagnostic = buildSessionDiagnostic({
      sessionFailure,
      tokenFailure: accessToken ? null : auth.failure ?? { kind: "missing_credentials", message: "no token" },
      scriptFailure,
      hostedPage,
    });

    if (this.config.hostedFieldsFallbackScriptSrc) {
      this.logger.warn({ reason: hostedPage.reason }, "serving fallback hosted-fields script");
      return this.hostedFields(
        context,
        "fallback",
        { scriptSrc: this.config.hostedFieldsFallbackScriptSrc },
        diagnostic,
      );
    }

    this.logger.error({ reason: hostedPage.reason, attempts: hostedPage.attempts.length }, "session waterfall exhausted");
    return {
      ok: false,
      context,
      message: SESSION_FAILURE_MESSAGE,
      diagnostic,
      debug: {
        backofficeTokenObtained: accessToken !== null,
        hostedFieldsScriptFound: false,
        hostedPage: { reason: hostedPage.reason, attempts: hostedPage.attempts },
      },
    };
  }

  private buildContext(currencyCode: string): SessionContext {
    const currency = currencyCode.trim().toUpperCase() || "USD";
    return {
      provider: "netvalve",
      environment: this.config.environment,
      currency_code: currency,
      site_id: this.config.siteId ?? null,
      client_id: this.config.clientId ?? null,
      netvalve_mid_id: resolveMidId(this.config, currency) ?? null,
    };
  }

  private hostedFields(
    context: SessionContext,
    source: HostedFieldsSource,
    details: Partial<HostedFieldsDetails> & { scriptSrc: string },
    diagnostic: string | null = null,
  ): SessionResult {
    return {
      ok: true,
      flow: "hpf",
      source,
      context,
      hostedFields: {
        scriptSrc: details.scriptSrc,
        integrity: details.integrity ?? null,
        version: details.version ?? null,
        paymentToken: details.paymentToken ?? null,
        jwtToken: details.jwtToken ?? null,
        traceId: details.traceId ?? null,
        scriptId: details.scriptId ?? null,
      },
      diagnostic,
    };
  }

  private async hostedPageFallback(
    request: SessionRequest,
    context: SessionContext,
    accessToken: string | null,
  ): Promise<HostedPageOutcome> {
    const attempts: HostedPageAttempt[] = [];
    if (!this.config.hostedPageFallbackEnabled) {
      return { ok: false, reason: "hpp_fallback_disabled", attempts };
    }
    if (!accessToken) {
      return { ok: false, reason: "hpp_fallback_no_bearer_token", attempts };
    }
    const amount = request.amount ?? 0;
    if (!(amount > 0)) {
      return { ok: false, reason: "hpp_fallback_missing_amount", attempts };
    }
    if (!context.site_id || !context.netvalve_mid_id) {
      return { ok: false, reason: "hpp_fallback_missing_site_or_mid", attempts };
    }

    const clientOrderId = request.cartId ?? `cart_${epochSeconds(this.clock)}`;
    const payload: Record<string, unknown> = {
      mode: this.config.hostedPageMode,
      amount: Math.round(amount * 100) / 100,
      currency: context.currency_code,
      siteId: context.site_id,
      netvalveMidId: context.netvalve_mid_id,
      clientOrderId,
      orderDesc: request.orderDescription ?? "Online checkout",
      successUrl: this.returnUrl("success", request.returnUrls),
      cancelUrl: this.returnUrl("cancel", request.returnUrls),
      failedUrl: this.returnUrl("failed", request.returnUrls),
      pendingUrl: this.returnUrl("pending", request.returnUrls),
    };

    for (const url of hostedPageCandidateUrls(this.config)) {
      const posted = await this.gateway.postHostedPageOrder(url, accessToken, payload);
      if (!posted.ok) {
        attempts.push({ method: "POST", url, status: 0, body: posted.failure.message });
        continue;
      }
      const response = posted.value;
      attempts.push({ method: "POST", url, status: response.status, body: response.text.slice(0, ATTEMPT_BODY_LIMIT) });
      if (response.status >= 400 || !response.contentType.toLowerCase().includes("application/json")) {
        continue;
      }
      const body = parseJsonObject(response.text);
      const redirectUrl = body ? extractRedirectUrl(body) : null;
      if (redirectUrl) {
        this.logger.info({ url }, "hosted payment order created");
        return { ok: true, redirectUrl, orderUrl: url, clientOrderId };
      }
    }
    return { ok: false, reason: "hpp_fallback_no_redirect", attempts };
  }

  private returnUrl(kind: keyof HostedPageReturnUrls, overrides: HostedPageReturnUrls | undefined): string {
    return (
      overrides?.[kind]
      ?? this.config.hostedPageReturnUrls[kind]
      ?? `${this.config.returnBaseUrl}/checkout/payment?gateway_status=${kind}`
    );
  }
}
