import type { TokenCachePort } from "../../ports/token-cache.js";

/** The subset of the ioredis client the cache relies on. */
export interface RedisTokenClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "PX", ttlMs: number): Promise<unknown>;
  del(key: string): Promise<number>;
}

export class RedisTokenCache implements TokenCachePort {
  constructor(
    private readonly redis: RedisTokenClient,
    private readonly keyPrefix: string,
  ) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(this.namespaced(key));
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    await this.redis.set(this.namespaced(key), value, "PX", Math.max(1, Math.floor(ttlMs)));
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.namespaced(key));
  }

  private namespaced(key: string): string {
    return `${this.keyPrefix}:token:${key}`;
  }
}
