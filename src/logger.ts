import { pino, type Logger } from "pino";

export type { Logger };

export const logger: Logger = pino({
  name: "episode-sync",
  level: process.env.LOG_LEVEL || "info",
});

export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
