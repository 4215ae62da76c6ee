// lib/logger.ts
import pino from "pino";

/**
 * JSON to stdout, which Lambda ships to CloudWatch.
 * NODE_ENV=development switches to pino-pretty; tests run silent unless
 * LOG_LEVEL says otherwise.
 */
export function createLogger(name: string): pino.Logger {
  const env = process.env.NODE_ENV;
  const level = process.env.LOG_LEVEL || (env === "test" ? "silent" : "info");

  if (env === "development") {
    return pino({
      name,
      level,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname" },
      },
    });
  }

  return pino({ name, level });
}

export const logger = createLogger("hvac-heartbeat");
