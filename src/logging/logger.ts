import pino, { type Logger } from "pino";
import { resolveLogLevelOrDefault } from "../config";

export type { Logger } from "pino";

const { level, rejected } = resolveLogLevelOrDefault();

export const logger: Logger = pino({
  level,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  base: {
    service: "actor-behaviors",
  },
});

if (rejected !== undefined) {
  logger.warn({ requested: rejected, level }, "unknown LOG_LEVEL, using default");
}

export const createModuleLogger = (module: string): Logger => {
  return logger.child({ module });
};
