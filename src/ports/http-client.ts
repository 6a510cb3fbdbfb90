export type HttpMethod = "GET" | "POST";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  json?: unknown;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  contentType: string;
  text: string;
}

/** Rejects on transport failures and timeouts; any HTTP status resolves. */
export interface HttpClientPort {
  request(input: HttpRequest): Promise<HttpResponse>;
}
