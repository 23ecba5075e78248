import pino from "pino";
import { env } from "#/env";

export const logger = pino({
  level: env.LOG_LEVEL,
  base: { service: "sentinel-auth" },
  redact: {
    paths: [
      "password",
      "newPassword",
      "securityAnswer",
      "token",
      "*.password",
      "*.newPassword",
      "*.securityAnswer",
      "*.token",
    ],
    censor: "[redacted]",
  },
  ...(env.LOG_PRETTY
    ? { transport: { target: "pino-pretty", options: { colorize: true } } }
    : {}),
});
