import pino from "pino";

const redactionPaths = ["*.headers.authorization", "*.headers.cookie", "*.authorization", "*.api_token"];

const pretty =
  process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test"
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname"
        }
      }
    : undefined;

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  redact: { paths: redactionPaths, censor: "[REDACTED]" },
  transport: pretty
});
