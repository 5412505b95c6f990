import pino from "pino";

const redactionPaths = ["*.headers.authorization", "*.private_key", "*.client_email", "*.access_token"];

const env = process.env.NODE_ENV;
const pretty =
  env !== "production" && env !== "test"
    ? pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname"
        }
      })
    : undefined;

export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? "info",
    redact: { paths: redactionPaths, censor: "[REDACTED]" }
  },
  pretty
);
