import pino from "pino";

export type Logger = pino.Logger;

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || "info",
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
});

// Component-scoped logger factory
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}
