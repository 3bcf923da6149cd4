import pino from "pino";

// Pretty print outside production and test runs
const nodeEnv = process.env.NODE_ENV;
const transport =
  nodeEnv === "production" || nodeEnv === "test"
    ? undefined
    : {
        target: "pino-pretty",
        options: {
          colorize: true,
          ignore: "pid,hostname",
          translateTime: "SYS:standard",
        },
      };

/**
 * Application logger.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport,
});

export type Logger = typeof logger;
