import { pino } from "pino";
import type { Logger } from "pino";

export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  base: { service: "media-transcriber" },
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}

export type { Logger };
