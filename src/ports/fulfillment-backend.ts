import type { HttpMethod } from "./http-client.js";

export interface FulfillmentRequest {
  endpoint: string;
  method: HttpMethod;
  payload?: Record<string, unknown>;
  params?: Record<string, string>;
  headers?: Record<string, string>;
  /** Storefront routes authenticate with the publishable key instead of the admin token. */
  useAdminToken?: boolean;
}

export interface FulfillmentResponse {
  success: boolean;
  statusCode: number;
  message: string;
  data: Record<string, unknown> | null;
}

export interface FulfillmentBackendPort {
  authenticate(): Promise<string | null>;
  execute(request: FulfillmentRequest): Promise<FulfillmentResponse>;
}
