import pino, { type Logger } from "pino";
import pinoPretty from "pino-pretty";

import { loadConfig } from "../config";

const { LOG_LEVEL, LOG_PRETTY } = loadConfig();

export const logger: Logger = pino(
  {
    level: LOG_LEVEL,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  LOG_PRETTY
    ? pinoPretty({
        colorize: true,
        translateTime: "SYS:HH:MM:ss",
        ignore: "pid,hostname",
      })
    : process.stdout
);

/**
 * Child logger whose messages read `[LAYER] [COMPONENT] ...`, e.g. `[SERVICE] [SCHEDULER]`.
 */
export function scopedLogger(layer: string, component?: string): Logger {
  const prefix = component ? `[${layer}] [${component}] ` : `[${layer}] `;
  return logger.child({}, { msgPrefix: prefix });
}

export type { Logger };
