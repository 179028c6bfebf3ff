import pino from "pino";
import type { Logger } from "pino";

const env = process.env.NODE_ENV || "development";
const isDev = env !== "production" && env !== "test";
const logLevel =
  process.env.LOG_LEVEL ||
  (env === "test" ? "silent" : env === "production" ? "info" : "debug");

export const logger = pino(
  isDev
    ? {
        level: logLevel,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      }
    : {
        level: logLevel,
      },
);

export type { Logger };

export default logger;
