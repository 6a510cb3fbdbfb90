import type { Logger } from "pino";
import { getOrRefresh } from "../../infra/token-refresh.js";
import type { HttpClientPort } from "../../ports/http-client.js";
import type { PublicIpResolverPort } from "../../ports/public-ip.js";
import type { TokenCachePort } from "../../ports/token-cache.js";

const LOOKUP_ENDPOINTS = [
  "https://api.ipify.org",
  "https://ifconfig.me/ip",
  "https://icanhazip.com",
] as const;

const IPV4_PATTERN = /^(?:(?:25[0-5]|2[0-4]\d|1?\d?\d)\.){3}(?:25[0-5]|2[0-4]\d|1?\d?\d)$/;
const CACHE_KEY = "public_ip";

interface PublicIpResolverOptions {
  timeoutMs?: number;
  ttlMs?: number;
}

export class HttpPublicIpResolver implements PublicIpResolverPort {
  private readonly timeoutMs: number;
  private readonly ttlMs: number;

  constructor(
    private readonly http: HttpClientPort,
    private readonly cache: TokenCachePort,
    private readonly logger: Logger,
    options: PublicIpResolverOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? 3000;
    this.ttlMs = options.ttlMs ?? 10 * 60 * 1000;
  }

  async resolve(): Promise<string | null> {
    return getOrRefresh(this.cache, CACHE_KEY, async () => {
      const address = await this.lookup();
      return address ? { value: address, ttlMs: this.ttlMs } : null;
    }, this.logger);
  }

  private async lookup(): Promise<string | null> {
    for (const url of LOOKUP_ENDPOINTS) {
      try {
        const response = await this.http.request({ method: "GET", url, timeoutMs: this.timeoutMs });
        const candidate = response.text.trim();
        if (response.status === 200 && IPV4_PATTERN.test(candidate)) {
          return candidate;
        }
      } catch (error) {
        this.logger.debug({ err: error, url }, "public IP lookup failed");
      }
    }
    this.logger.warn("unable to resolve public IP address");
    return null;
  }
}
