import pino from "pino";
import type { Principal } from "../accounts/account.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

export const logger = pino({
  level: resolveLevel(),
  base: {
    system: "gatehouse"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger with principal context attached.
 */
export function getContextLogger(principal: Principal) {
  return logger.child({
    accountId: principal.id,
    username: principal.username,
    role: principal.role
  });
}
