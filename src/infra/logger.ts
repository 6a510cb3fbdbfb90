import { pino, type Logger } from "pino";
import type { LogLevel } from "./config.js";

export type { Logger };

export function createLogger(options: { level: LogLevel; environment: string }): Logger {
  return pino({
    level: options.level,
    base: { service: "webhook-settlement-gateway", environment: options.environment },
    redact: {
      paths: ["password", "*.password", "apiKey", "*.apiKey", "accessToken", "*.accessToken"],
      censor: "[redacted]",
    },
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function maskToken(token: string): string {
  return token.length > 12 ? `${token.slice(0, 12)}...` : token;
}
