import type { HttpClientPort, HttpRequest, HttpResponse } from "../../ports/http-client.js";

export function buildUrl(url: string, query?: Record<string, string>): string {
  if (!query || Object.keys(query).length === 0) {
    return url;
  }
  const target = new URL(url);
  for (const [name, value] of Object.entries(query)) {
    target.searchParams.set(name, value);
  }
  return target.toString();
}

export class FetchHttpClient implements HttpClientPort {
  async request(input: HttpRequest): Promise<HttpResponse> {
    const headers: Record<string, string> = { accept: "application/json", ...input.headers };
    let body: string | undefined;
    if (input.json !== undefined) {
      headers["content-type"] = "application/json";
      body = JSON.stringify(input.json);
    }

    const response = await fetch(buildUrl(input.url, input.query), {
      method: input.method,
      headers,
      ...(body !== undefined ? { body } : {}),
      signal: AbortSignal.timeout(input.timeoutMs),
    });

    return {
      status: response.status,
      contentType: response.headers.get("content-type") ?? "",
      text: await response.text(),
    };
  }
}
