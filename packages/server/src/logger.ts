import pino from "pino";

import { config } from "./config.js";

const isProd = process.env.NODE_ENV === "production";

const defaultLevel = config.isTestEnvironment ? "silent" : isProd ? "info" : "debug";

export const logger = pino({
  level: config.logLevel ?? defaultLevel,
  base: { service: config.serviceName },
  transport:
    isProd || config.isTestEnvironment
      ? undefined
      : {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
          },
        },
});

export const withCorrelation = (correlationId?: string) =>
  correlationId ? logger.child({ correlationId }) : logger;
