import type { Logger } from "pino";
import { readText } from "../../domain/sale-response.js";
import { errorMessage } from "../../infra/app-error.js";
import type { GatewayConfig } from "../../infra/config.js";
import { isRecord, parseJson, parseJsonObject } from "../../infra/json.js";
import type {
  BackofficeToken,
  CardGatewayPort,
  GatewayFailure,
  GatewayJsonResponse,
  GatewayRawResponse,
  GatewayResult,
  HostedFieldsScript,
  HostedFieldsSession,
  TransactionOperationBody,
} from "../../ports/card-gateway.js";
import type { HttpClientPort, HttpRequest, HttpResponse } from "../../ports/http-client.js";

interface NetvalveGatewayOptions {
  sessionTimeoutMs?: number;
  hostedPageTimeoutMs?: number;
  saleTimeoutMs?: number;
  operationTimeoutMs?: number;
}

function failure(kind: GatewayFailure["kind"], message: string, httpStatus?: number): { ok: false; failure: GatewayFailure } {
  return {
    ok: false,
    failure: { kind, message, ...(httpStatus !== undefined ? { httpStatus } : {}) },
  };
}

export function jwtFromScriptUrl(scriptSrc: string | null): string | null {
  if (!scriptSrc) {
    return null;
  }
  try {
    return new URL(scriptSrc).searchParams.get("jwtToken");
  } catch {
    return null;
  }
}

function mapScript(entry: Record<string, unknown>): HostedFieldsScript {
  return {
    id: readText(entry, "id"),
    status: readText(entry, "status"),
    deleted: entry.deleted === true,
    scriptSrc: readText(entry, "netvalveScriptSrc"),
    isDefault: entry.isDefault === true,
    createdDate: readText(entry, "createdDate"),
    integrity: readText(entry, "integrity"),
    clientVersion: readText(entry, "clientVersion"),
  };
}

export class NetvalveGateway implements CardGatewayPort {
  private readonly sessionTimeoutMs: number;
  private readonly hostedPageTimeoutMs: number;
  private readonly saleTimeoutMs: number;
  private readonly operationTimeoutMs: number;

  constructor(
    private readonly http: HttpClientPort,
    private readonly config: GatewayConfig,
    private readonly logger: Logger,
    options: NetvalveGatewayOptions = {},
  ) {
    this.sessionTimeoutMs = options.sessionTimeoutMs ?? 10_000;
    this.hostedPageTimeoutMs = options.hostedPageTimeoutMs ?? 15_000;
    this.saleTimeoutMs = options.saleTimeoutMs ?? 30_000;
    this.operationTimeoutMs = options.operationTimeoutMs ?? 15_000;
  }

  async initializeHostedFieldsSession(): Promise<GatewayResult<HostedFieldsSession>> {
    const headers = this.credentialHeaders();
    if (!headers) {
      return failure("missing_credentials", "NETVALVE_CLIENT_ID and NETVALVE_API_KEY are not configured");
    }
    const sent = await this.send({
      method: "GET",
      url: `${this.config.paymentApiUrl}/hpf/initializeSession`,
      headers,
      timeoutMs: this.sessionTimeoutMs,
    });
    if (!sent.ok) {
      return sent;
    }
    const response = sent.value;
    if (response.status !== 200) {
      return failure("http_error", `initializeSession returned HTTP ${response.status}`, response.status);
    }
    const body = parseJsonObject(response.text);
    if (!body) {
      return failure("invalid_response", "initializeSession returned a non-JSON body", response.status);
    }
    const scriptSrc = readText(body, "netvalveScriptSrc");
    const paymentToken = readText(body, "paymentToken");
    if (!scriptSrc && !paymentToken) {
      return failure("invalid_response", "initializeSession returned neither a script nor a payment token");
    }
    return {
      ok: true,
      value: {
        scriptSrc,
        paymentToken,
        jwtToken: readText(body, "jwtToken") ?? jwtFromScriptUrl(scriptSrc),
        integrity: readText(body, "integrity"),
        version: readText(body, "version"),
        traceId: readText(body, "traceID", "traceId"),
      },
    };
  }

  async signInBackoffice(): Promise<GatewayResult<BackofficeToken>> {
    const { backofficeUsername, backofficePassword } = this.config;
    if (!backofficeUsername || !backofficePassword) {
      return failure("missing_credentials", "backoffice username and password are not configured");
    }
    const sent = await this.send({
      method: "POST",
      url: `${this.config.backofficeApiUrl}/backoffice/users/sign-in`,
      json: { userName: backofficeUsername, password: backofficePassword, checkForBot: "net" },
      timeoutMs: this.sessionTimeoutMs,
    });
    if (!sent.ok) {
      return sent;
    }
    const response = sent.value;
    if (response.status !== 200) {
      return failure("http_error", `backoffice sign-in returned HTTP ${response.status}`, response.status);
    }
    const body = parseJsonObject(response.text);
    const accessToken = body ? readText(body, "accessToken") : null;
    if (!body || !accessToken) {
      return failure("invalid_response", "backoffice sign-in response carried no access token", response.status);
    }
    const expiresIn = body.expiresIn;
    return {
      ok: true,
      value: {
        accessToken,
        expiresInSeconds: typeof expiresIn === "number" && expiresIn > 0 ? expiresIn : 3600,
      },
    };
  }

  async listHostedFieldsScripts(accessToken: string): Promise<GatewayResult<HostedFieldsScript[]>> {
    const sent = await this.send({
      method: "GET",
      url: `${this.config.backofficeApiUrl}/backoffice/hpf/script`,
      headers: { authorization: `Bearer ${accessToken}` },
      timeoutMs: this.sessionTimeoutMs,
    });
    if (!sent.ok) {
      return sent;
    }
    const response = sent.value;
    if (response.status !== 200) {
      return failure("http_error", `script listing returned HTTP ${response.status}`, response.status);
    }
    const parsed = parseJson(response.text);
    if (!parsed.ok) {
      return failure("invalid_response", "script listing returned a non-JSON body", response.status);
    }
    const entries = Array.isArray(parsed.value)
      ? parsed.value
      : isRecord(parsed.value) && Array.isArray(parsed.value.data)
        ? parsed.value.data
        : [];
    const scripts: HostedFieldsScript[] = [];
    for (const entry of entries) {
      if (isRecord(entry)) {
        scripts.push(mapScript(entry));
      }
    }
    return { ok: true, value: scripts };
  }

  async postHostedPageOrder(
    url: string,
    accessToken: string,
    payload: Record<string, unknown>,
  ): Promise<GatewayResult<GatewayRawResponse>> {
    const sent = await this.send({
      method: "POST",
      url,
      headers: { authorization: `Bearer ${accessToken}` },
      json: payload,
      timeoutMs: this.hostedPageTimeoutMs,
    });
    if (!sent.ok) {
      return sent;
    }
    return {
      ok: true,
      value: { status: sent.value.status, contentType: sent.value.contentType, text: sent.value.text },
    };
  }

  async sale(payload: Record<string, unknown>): Promise<GatewayResult<GatewayJsonResponse>> {
    const headers = this.credentialHeaders();
    if (!headers) {
      return failure("missing_credentials", "NETVALVE_CLIENT_ID and NETVALVE_API_KEY are not configured");
    }
    const sent = await this.send({
      method: "POST",
      url: `${this.config.paymentApiUrl}/sale`,
      headers,
      json: payload,
      timeoutMs: this.saleTimeoutMs,
    });
    if (!sent.ok) {
      return sent;
    }
    const response = sent.value;
    const body = parseJsonObject(response.text);
    if (!body) {
      return failure(
        "invalid_response",
        `Non-JSON response: ${response.text.slice(0, 200)}`,
        response.status,
      );
    }
    return { ok: true, value: { httpStatus: response.status, body } };
  }

  async postTransactionOperation(
    operation: "capture" | "refund" | "cancel",
    body: TransactionOperationBody,
  ): Promise<GatewayResult<GatewayJsonResponse>> {
    const headers = this.credentialHeaders();
    if (!headers) {
      return failure("missing_credentials", "NETVALVE_CLIENT_ID and NETVALVE_API_KEY are not configured");
    }
    const sent = await this.send({
      method: "POST",
      url: `${this.config.paymentApiUrl}/${operation}`,
      headers,
      json: body,
      timeoutMs: this.operationTimeoutMs,
    });
    if (!sent.ok) {
      return sent;
    }
    const response = sent.value;
    if (response.status >= 500) {
      return { ok: true, value: { httpStatus: response.status, body: {} } };
    }
    const parsed = parseJsonObject(response.text);
    if (!parsed) {
      return failure("invalid_response", `${operation} returned a non-JSON body`, response.status);
    }
    return { ok: true, value: { httpStatus: response.status, body: parsed } };
  }

  private credentialHeaders(): Record<string, string> | null {
    const { clientId, apiKey } = this.config;
    if (!clientId || !apiKey) {
      return null;
    }
    return { "netvalve-client-id": clientId, "netvalve-api-key": apiKey };
  }

  private async send(request: HttpRequest): Promise<GatewayResult<HttpResponse>> {
    try {
      return { ok: true, value: await this.http.request(request) };
    } catch (error) {
      this.logger.error({ err: error, url: request.url }, "gateway request failed");
      return failure("transport_error", errorMessage(error));
    }
  }
}
