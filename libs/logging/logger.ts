import pino from "pino";
import { z } from "zod";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const logger = pino({
  level: LogLevelSchema.catch("info").parse(process.env.LOG_LEVEL),
  base: {
    system: "document-mediation"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger bound to the acting principal.
 */
export function getActorLogger(actorId: string, component?: string) {
  return logger.child({
    actorId,
    ...(component ? { component } : {})
  });
}
