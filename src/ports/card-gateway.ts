export type GatewayFailureKind =
  | "missing_credentials"
  | "transport_error"
  | "http_error"
  | "invalid_response";

export interface GatewayFailure {
  kind: GatewayFailureKind;
  message: string;
  httpStatus?: number;
}

export type GatewayResult<TValue> = { ok: true; value: TValue } | { ok: false; failure: GatewayFailure };

export interface HostedFieldsSession {
  scriptSrc: string | null;
  paymentToken: string | null;
  jwtToken: string | null;
  integrity: string | null;
  version: string | null;
  traceId: string | null;
}

export interface BackofficeToken {
  accessToken: string;
  expiresInSeconds: number;
}

export interface HostedFieldsScript {
  id: string | null;
  status: string | null;
  deleted: boolean;
  scriptSrc: string | null;
  isDefault: boolean;
  createdDate: string | null;
  integrity: string | null;
  clientVersion: string | null;
}

export interface GatewayRawResponse {
  status: number;
  contentType: string;
  text: string;
}

export interface GatewayJsonResponse {
  httpStatus: number;
  body: Record<string, unknown>;
}

export interface TransactionOperationBody {
  transactionID: number;
  amount?: number;
}

export interface CardGatewayPort {
  initializeHostedFieldsSession(): Promise<GatewayResult<HostedFieldsSession>>;
  signInBackoffice(): Promise<GatewayResult<BackofficeToken>>;
  listHostedFieldsScripts(accessToken: string): Promise<GatewayResult<HostedFieldsScript[]>>;
  postHostedPageOrder(
    url: string,
    accessToken: string,
    payload: Record<string, unknown>,
  ): Promise<GatewayResult<GatewayRawResponse>>;
  sale(payload: Record<string, unknown>): Promise<GatewayResult<GatewayJsonResponse>>;
  /** A response with HTTP status >= 500 resolves with an empty body. */
  postTransactionOperation(
    operation: "capture" | "refund" | "cancel",
    body: TransactionOperationBody,
  ): Promise<GatewayResult<GatewayJsonResponse>>;
}
