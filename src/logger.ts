import pino from "pino";
import type { Logger } from "pino";
import { config } from "./config";

export type { Logger };

export const logger: Logger = pino({
  name: config.serviceName,
  level: config.logLevel
});

export function childLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
