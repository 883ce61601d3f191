import pino from "pino";
import { env } from "./config";

// stdout belongs to command output, so logs go to stderr.
export const logger = pino(
  {
    level: env.LOG_LEVEL,
    transport: env.LOG_PRETTY
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
            destination: 2,
          },
        }
      : undefined,
  },
  env.LOG_PRETTY ? undefined : pino.destination(2)
);

export type Logger = typeof logger;
