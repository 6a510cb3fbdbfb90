import type { Logger } from "pino";
import type { TokenCachePort } from "../ports/token-cache.js";

export interface RefreshedToken {
  value: string;
  ttlMs: number;
}

/**
 * Returns the cached value for `key`, or runs `refresh` and caches its result.
 * Concurrent callers may both refresh; the last write wins.
 * An unavailable cache reads as a miss and writes are skipped.
 */
export async function getOrRefresh(
  cache: TokenCachePort,
  key: string,
  refresh: () => Promise<RefreshedToken | null>,
  logger: Logger,
): Promise<string | null> {
  let cached: string | null = null;
  try {
    cached = await cache.get(key);
  } catch (error) {
    logger.warn({ err: error, key }, "token cache read failed");
  }
  if (cached !== null) {
    return cached;
  }
  const refreshed = await refresh();
  if (refreshed === null) {
    return null;
  }
  if (refreshed.ttlMs > 0) {
    try {
      await cache.set(key, refreshed.value, refreshed.ttlMs);
    } catch (error) {
      logger.warn({ err: error, key }, "token cache write failed");
    }
  }
  return refreshed.value;
}

export async function evictCached(cache: TokenCachePort, key: string, logger: Logger): Promise<void> {
  try {
    await cache.delete(key);
  } catch (error) {
    logger.warn({ err: error, key }, "token cache eviction failed");
  }
}
