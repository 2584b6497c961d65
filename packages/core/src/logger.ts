/**
 * didseal: structured logging.
 */

import { pino, type Logger } from "pino";
import { config } from "./config.js";

export const logger: Logger = pino({
  name: "didseal",
  level: config.logLevel,
  redact: {
    paths: ["*.d", "*.privateKey", "*.cek", "*.kek", "*.secret"],
    censor: "[REDACTED]",
  },
});

/** Child logger tagged with the emitting module. */
export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
