import pino from "pino";
import type { Logger } from "pino";
import type { ProxyConfig } from "./config.js";

export type { Logger };

/**
 * JSON logger at the configured level, pretty-printed in development.
 */
export function createLogger(config: Pick<ProxyConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/** Default for components constructed without a logger. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
