import pino from "pino";

const redactionPaths = [
  "*.headers.authorization",
  "*.authorization",
  "*.access_token",
  "*.refresh_token",
  "*.accessToken",
  "*.refreshToken",
  "*.code"
];

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

const destination: pino.DestinationStream | undefined = pretty ? pino.transport(pretty) : undefined;

export const logger = pino(
  {
    name: "runtime-sync",
    level: process.env.LOG_LEVEL ?? "info",
    redact: { paths: redactionPaths, censor: "[REDACTED]" }
  },
  destination
);
