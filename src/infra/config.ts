import { AppError } from "./app-error.js";

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseStringListEnv(name: string, minItemLength: number, maxItems: number): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  if (items.length > maxItems) {
    throw invalidConfig(name, `must contain at most ${maxItems} values`);
  }
  for (const item of items) {
    if (item.length < minItemLength) {
      throw invalidConfig(name, `items must contain at least ${minItemLength} characters`);
    }
  }

  return [...new Set(items)];
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

// Deployment templates often export gateway variables as empty strings; blank means unset.
function parseOptionalSettingEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function parseOptionalUrlEnv(name: string): string | undefined {
  const value = parseOptionalSettingEnv(name);
  if (value === undefined) {
    return undefined;
  }
  if (!/^https?:\/\//i.test(value)) {
    throw invalidConfig(name, "must be an http(s) URL");
  }
  return value.replace(/\/+$/, "");
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

export type GatewayEnvironment = "sandbox" | "production";
export type SupportedMidCurrency = "EUR" | "USD" | "PHP";

const GATEWAY_DEFAULT_URLS: Record<
  GatewayEnvironment,
  { backoffice: string; paymentApi: string; hostedPage: string }
> = {
  sandbox: {
    backoffice: "https://backoffice-api.uat.sandbox-netvalve.com",
    paymentApi: "https://payment-api.uat.sandbox-netvalve.com",
    hostedPage: "https://hpp-api.uat.sandbox-netvalve.com",
  },
  production: {
    backoffice: "https://backoffice-api.netvalve.com",
    paymentApi: "https://api.netvalve.com",
    hostedPage: "https://hpp-api.netvalve.com",
  },
};

export const SANDBOX_FALLBACK_SCRIPT_SRC = "https://tokenfield.uat.sandbox-netvalve.com/sdk/index.DUbZDKWj.js";

export interface HostedPageReturnUrls {
  success?: string;
  cancel?: string;
  failed?: string;
  pending?: string;
}

export interface GatewayConfig {
  environment: GatewayEnvironment;
  clientId?: string;
  apiKey?: string;
  siteId?: string;
  midIds: Partial<Record<SupportedMidCurrency, string>>;
  paymentApiUrl: string;
  backofficeApiUrl: string;
  hostedPageBaseUrl: string;
  backofficeUsername?: string;
  backofficePassword?: string;
  hostedFieldsScriptSrc?: string;
  hostedFieldsScriptIntegrity?: string;
  hostedFieldsFallbackScriptSrc?: string;
  hostedPageDirectUrl?: string;
  hostedPageFallbackEnabled: boolean;
  hostedPageOrderHost?: string;
  hostedPageOrderPath?: string;
  hostedPageMode: string;
  hostedPageReturnUrls: HostedPageReturnUrls;
  returnBaseUrl: string;
}

export interface FulfillmentConfig {
  baseUrl: string;
  adminEmail?: string;
  adminPassword?: string;
  publishableKey?: string;
  tokenTtlSeconds: number;
  requestTimeoutMs: number;
}

export type DeploymentEnvironment = "development" | "staging" | "production";
export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface RuntimeConfig {
  host: string;
  port: number;
  environment: DeploymentEnvironment;
  logLevel: LogLevel;
  operatorApiKeys: string[];
  metricsEnabled: boolean;
  eventStoreBackend: "memory" | "postgres";
  tokenCacheBackend: "memory" | "redis";
  postgresUrl?: string;
  redisUrl?: string;
  redisKeyPrefix: string;
  corsOrigins: string[];
  slackAlertsUrl?: string;
  fulfillment: FulfillmentConfig;
  gateway: GatewayConfig;
}

export function resolveMidId(gateway: GatewayConfig, currency: string): string | undefined {
  const normalized = currency.trim().toUpperCase();
  if (normalized === "EUR" || normalized === "USD" || normalized === "PHP") {
    return gateway.midIds[normalized];
  }
  return gateway.midIds.USD ?? gateway.midIds.EUR ?? gateway.midIds.PHP;
}

function loadGatewayConfig(corsOrigins: string[]): GatewayConfig {
  const environment = parseEnumEnv(
    "NETVALVE_ENVIRONMENT",
    ["sandbox", "production"] as const,
    "sandbox",
  );
  const defaults = GATEWAY_DEFAULT_URLS[environment];

  const paymentApiUrl =
    parseOptionalUrlEnv("NETVALVE_PAYMENT_API_URL")
    ?? parseOptionalUrlEnv("NETVALVE_BASE_URL")
    ?? defaults.paymentApi;
  const backofficeApiUrl = parseOptionalUrlEnv("NETVALVE_BACKOFFICE_API_URL") ?? defaults.backoffice;
  const hostedPageBaseUrl =
    parseOptionalUrlEnv("NETVALVE_HPP_BASE_URL")
    ?? parseOptionalUrlEnv(
      environment === "production" ? "NETVALVE_PRODUCTION_HPP_BASE_URL" : "NETVALVE_SANDBOX_HPP_BASE_URL",
    )
    ?? defaults.hostedPage;

  const explicitFallbackScript = parseOptionalUrlEnv("NETVALVE_HPF_SCRIPT_FALLBACK_SRC");
  const hostedFieldsFallbackScriptSrc =
    explicitFallbackScript ?? (environment === "sandbox" ? SANDBOX_FALLBACK_SCRIPT_SRC : undefined);

  const midIds: Partial<Record<SupportedMidCurrency, string>> = {};
  for (const currency of ["EUR", "USD", "PHP"] as const) {
    const midId = parseOptionalSettingEnv(`NETVALVE_MID_ID_${currency}`);
    if (midId) {
      midIds[currency] = midId;
    }
  }

  const hostedPageReturnUrls: HostedPageReturnUrls = {};
  for (const kind of ["success", "cancel", "failed", "pending"] as const) {
    const url = parseOptionalUrlEnv(`NETVALVE_HPP_${kind.toUpperCase()}_URL`);
    if (url) {
      hostedPageReturnUrls[kind] = url;
    }
  }

  const returnBaseUrl =
    parseOptionalUrlEnv("NETVALVE_RETURN_BASE_URL")
    ?? corsOrigins[0]?.replace(/\/+$/, "")
    ?? "http://localhost:8000";

  const clientId = parseOptionalSettingEnv("NETVALVE_CLIENT_ID");
  const apiKey = parseOptionalSettingEnv("NETVALVE_API_KEY");
  const siteId = parseOptionalSettingEnv("NETVALVE_SITE_ID");
  const backofficeUsername = parseOptionalSettingEnv("NETVALVE_BASIC_AUTH_USERNAME");
  const backofficePassword = parseOptionalSettingEnv("NETVALVE_BASIC_AUTH_PASSWORD");
  const hostedFieldsScriptSrc = parseOptionalUrlEnv("NETVALVE_HPF_SCRIPT_SRC");
  const hostedFieldsScriptIntegrity = parseOptionalSettingEnv("NETVALVE_HPF_SCRIPT_INTEGRITY");
  const hostedPageDirectUrl = parseOptionalUrlEnv("NETVALVE_HPP_DIRECT_URL");
  const hostedPageOrderHost = parseOptionalUrlEnv("NETVALVE_HPP_ORDER_HOST");
  const hostedPageOrderPath = parseOptionalSettingEnv("NETVALVE_HPP_ORDER_PATH");

  return {
    environment,
    midIds,
    paymentApiUrl,
    backofficeApiUrl,
    hostedPageBaseUrl,
    hostedPageFallbackEnabled: parseBooleanEnv("NETVALVE_HPP_FALLBACK_ENABLED", true),
    hostedPageMode: parseStringEnv("NETVALVE_HPP_MODE", "SALE", 1).toUpperCase(),
    hostedPageReturnUrls,
    returnBaseUrl,
    ...(clientId ? { clientId } : {}),
    ...(apiKey ? { apiKey } : {}),
    ...(siteId ? { siteId } : {}),
    ...(backofficeUsername ? { backofficeUsername } : {}),
    ...(backofficePassword ? { backofficePassword } : {}),
    ...(hostedFieldsScriptSrc ? { hostedFieldsScriptSrc } : {}),
    ...(hostedFieldsScriptIntegrity ? { hostedFieldsScriptIntegrity } : {}),
    ...(hostedFieldsFallbackScriptSrc ? { hostedFieldsFallbackScriptSrc } : {}),
    ...(hostedPageDirectUrl ? { hostedPageDirectUrl } : {}),
    ...(hostedPageOrderHost ? { hostedPageOrderHost } : {}),
    ...(hostedPageOrderPath ? { hostedPageOrderPath } : {}),
  };
}

export function loadRuntimeConfig(): RuntimeConfig {
  const defaultOperatorKey = "dev_operator_key";
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const environment = parseEnumEnv(
    "PAYHOOK_ENVIRONMENT",
    ["development", "staging", "production"] as const,
    "development",
  );
  const logLevel = parseEnumEnv(
    "PAYHOOK_LOG_LEVEL",
    ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const,
    "info",
  );
  const operatorApiKeys = parseStringListEnv("PAYHOOK_OPERATOR_API_KEYS", 8, 100) ?? [defaultOperatorKey];
  const metricsEnabled = parseBooleanEnv("PAYHOOK_METRICS_ENABLED", true);
  const eventStoreBackend = parseEnumEnv(
    "PAYHOOK_EVENT_STORE_BACKEND",
    ["memory", "postgres"] as const,
    "memory",
  );
  const tokenCacheBackend = parseEnumEnv(
    "PAYHOOK_TOKEN_CACHE_BACKEND",
    ["memory", "redis"] as const,
    "memory",
  );
  const postgresUrl = parseOptionalStringEnv("PAYHOOK_POSTGRES_URL", 12);
  const redisUrl = parseOptionalStringEnv("PAYHOOK_REDIS_URL", 8);
  const redisKeyPrefix = parseStringEnv("PAYHOOK_REDIS_KEY_PREFIX", "payhook", 3);
  const corsOrigins = parseStringListEnv("PAYHOOK_CORS_ORIGINS", 4, 20) ?? [];
  const slackAlertsUrl = parseOptionalUrlEnv("PAYHOOK_SLACK_ALERTS_URL");

  const adminEmail = parseOptionalSettingEnv("PAYHOOK_FULFILLMENT_ADMIN_EMAIL");
  const adminPassword = parseOptionalSettingEnv("PAYHOOK_FULFILLMENT_ADMIN_PASSWORD");
  const publishableKey = parseOptionalSettingEnv("PAYHOOK_FULFILLMENT_PUBLISHABLE_KEY");
  const fulfillment: FulfillmentConfig = {
    baseUrl: parseOptionalUrlEnv("PAYHOOK_FULFILLMENT_BASE_URL") ?? "http://localhost:9000",
    tokenTtlSeconds: parseIntegerEnv("PAYHOOK_FULFILLMENT_TOKEN_TTL_SECONDS", 82_800, 60, 604_800),
    requestTimeoutMs: parseIntegerEnv("PAYHOOK_FULFILLMENT_TIMEOUT_MS", 30_000, 100, 120_000),
    ...(adminEmail ? { adminEmail } : {}),
    ...(adminPassword ? { adminPassword } : {}),
    ...(publishableKey ? { publishableKey } : {}),
  };

  if (environment === "production" && operatorApiKeys.includes(defaultOperatorKey)) {
    throw invalidConfig("PAYHOOK_OPERATOR_API_KEYS", "must not include default key value in production");
  }
  if (eventStoreBackend === "postgres" && !postgresUrl) {
    throw invalidConfig("PAYHOOK_POSTGRES_URL", "is required when the postgres event store is enabled");
  }
  if (tokenCacheBackend === "redis" && !redisUrl) {
    throw invalidConfig("PAYHOOK_REDIS_URL", "is required when the redis token cache is enabled");
  }

  return {
    host,
    port,
    environment,
    logLevel,
    operatorApiKeys,
    metricsEnabled,
    eventStoreBackend,
    tokenCacheBackend,
    redisKeyPrefix,
    corsOrigins,
    fulfillment,
    gateway: loadGatewayConfig(corsOrigins),
    ...(postgresUrl ? { postgresUrl } : {}),
    ...(redisUrl ? { redisUrl } : {}),
    ...(slackAlertsUrl ? { slackAlertsUrl } : {}),
  };
}
