import { SystemClock, epochMillis, type ClockPort } from "../../infra/clock.js";
import type { TokenCachePort } from "../../ports/token-cache.js";

interface CachedEntry {
  value: string;
  expiresAtMs: number;
}

export class InMemoryTokenCache implements TokenCachePort {
  private readonly entries = new Map<string, CachedEntry>();

  constructor(private readonly clock: ClockPort = new SystemClock()) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAtMs <= this.nowMs()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    this.entries.set(key, { value, expiresAtMs: this.nowMs() + ttlMs });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  private nowMs(): number {
    return epochMillis(this.clock);
  }
}
