import type { Logger } from "pino";
import { readText } from "../../domain/sale-response.js";
import { errorMessage } from "../../infra/app-error.js";
import type { FulfillmentConfig } from "../../infra/config.js";
import { parseJsonObject } from "../../infra/json.js";
import { evictCached, getOrRefresh } from "../../infra/token-refresh.js";
import type {
  FulfillmentBackendPort,
  FulfillmentRequest,
  FulfillmentResponse,
} from "../../ports/fulfillment-backend.js";
import type { HttpClientPort } from "../../ports/http-client.js";
import type { TokenCachePort } from "../../ports/token-cache.js";

const ADMIN_TOKEN_KEY = "fulfillment:admin_token";
const SUCCESS_STATUSES = new Set([200, 201, 204]);

interface HttpFulfillmentBackendOptions {
  maxAuthAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class HttpFulfillmentBackend implements FulfillmentBackendPort {
  private readonly maxAuthAttempts: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly http: HttpClientPort,
    private readonly tokenCache: TokenCachePort,
    private readonly config: FulfillmentConfig,
    private readonly logger: Logger,
    options: HttpFulfillmentBackendOptions = {},
  ) {
    this.maxAuthAttempts = options.maxAuthAttempts ?? 3;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async authenticate(): Promise<string | null> {
    return getOrRefresh(this.tokenCache, ADMIN_TOKEN_KEY, async () => {
      const token = await this.requestAdminToken();
      return token ? { value: token, ttlMs: this.config.tokenTtlSeconds * 1000 } : null;
    }, this.logger);
  }

  async execute(request: FulfillmentRequest): Promise<FulfillmentResponse> {
    return this.executeOnce(request, true);
  }

  private async executeOnce(request: FulfillmentRequest, allowReauth: boolean): Promise<FulfillmentResponse> {
    const useAdminToken = request.useAdminToken ?? true;
    const headers: Record<string, string> = { ...request.headers };
    if (useAdminToken) {
      const token = await this.authenticate();
      if (!token) {
        return {
          success: false,
          statusCode: 401,
          message: "Fulfillment backend authentication failed",
          data: null,
        };
      }
      headers.authorization = `Bearer ${token}`;
    }

    let status: number;
    let text: string;
    try {
      const response = await this.http.request({
        method: request.method,
        url: `${this.config.baseUrl}${request.endpoint}`,
        headers,
        timeoutMs: this.config.requestTimeoutMs,
        ...(request.params ? { query: request.params } : {}),
        ...(request.payload ? { json: request.payload } : {}),
      });
      status = response.status;
      text = response.text;
    } catch (error) {
      this.logger.error({ err: error, endpoint: request.endpoint }, "fulfillment request failed");
      return { success: false, statusCode: 0, message: `Request failed: ${errorMessage(error)}`, data: null };
    }

    if (status === 401 && useAdminToken && allowReauth) {
      this.logger.info({ endpoint: request.endpoint }, "fulfillment token rejected, re-authenticating");
      await evictCached(this.tokenCache, ADMIN_TOKEN_KEY, this.logger);
      return this.executeOnce(request, false);
    }

    const data = parseJsonObject(text);
    const success = SUCCESS_STATUSES.has(status);
    return {
      success,
      statusCode: status,
      message: success ? "OK" : (data ? readText(data, "message") : null) ?? `HTTP ${status}`,
      data,
    };
  }

  private async requestAdminToken(): Promise<string | null> {
    const { adminEmail, adminPassword } = this.config;
    if (!adminEmail || !adminPassword) {
      this.logger.warn("fulfillment admin credentials are not configured");
      return null;
    }

    for (let attempt = 0; attempt < this.maxAuthAttempts; attempt += 1) {
      try {
        const response = await this.http.request({
          method: "POST",
          url: `${this.config.baseUrl}/auth/user/emailpass`,
          json: { email: adminEmail, password: adminPassword },
          timeoutMs: this.config.requestTimeoutMs,
        });
        const body = parseJsonObject(response.text);
        const token = body ? readText(body, "token") : null;
        if (SUCCESS_STATUSES.has(response.status) && token) {
          return token;
        }
        this.logger.warn({ status: response.status, attempt: attempt + 1 }, "fulfillment authentication rejected");
      } catch (error) {
        this.logger.warn({ err: error, attempt: attempt + 1 }, "fulfillment authentication failed");
      }
      if (attempt < this.maxAuthAttempts - 1) {
        await this.sleep(2 ** attempt * 1000);
      }
    }
    this.logger.error({ attempts: this.maxAuthAttempts }, "fulfillment authentication exhausted");
    return null;
  }
}
