import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

export const parseCorsOrigins = (value: string): string[] =>
  value
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

export const buildDatabaseUrl = ({
  host,
  port,
  database,
  user,
  password,
}: {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}): string =>
  `mysql://${encodeURIComponent(user)}:${encodeURIComponent(
    password,
  )}@${host}:${port}/${database}`;

const flag = (fallback: "true" | "false") =>
  z.string().default(fallback).pipe(z.stringbool());

export const env = createEnv({
  server: {
    PORT: z.coerce.number().default(3000),
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),
    CREDENTIAL_STORE: z.enum(["memory", "mysql"]).default("memory"),
    MYSQL_HOST: z.string().default("127.0.0.1"),
    MYSQL_PORT: z.coerce.number().default(3306),
    MYSQL_DATABASE: z.string().default("sentinel"),
    MYSQL_USER: z.string().default("sentinel"),
    MYSQL_PASSWORD: z.string().default(""),
    JWT_SECRET: z.string().min(16, "JWT_SECRET must be at least 16 characters"),
    JWT_ISSUER: z.string().default("sentinel"),
    AUTH_TOKEN_TTL_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .default(60 * 60 * 24),
    AUTH_SESSION_COOKIE_NAME: z.string().default("sentinel_session_token"),
    AUTH_LOGOUT_REVOCATION: flag("true"),
    AUTH_REVOCATION_SWEEP_SECONDS: z.coerce.number().int().positive().default(300),
    BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(31).default(10),
    AUTH_USERNAME_MIN_LENGTH: z.coerce.number().int().min(1).default(3),
    AUTH_USERNAME_MAX_LENGTH: z.coerce.number().int().max(64).default(32),
    AUTH_PASSWORD_MIN_LENGTH: z.coerce.number().int().min(1).default(8),
    AUTH_PASSWORD_REQUIRE_LOWERCASE: flag("true"),
    AUTH_PASSWORD_REQUIRE_UPPERCASE: flag("true"),
    AUTH_PASSWORD_REQUIRE_DIGIT: flag("true"),
    AUTH_PASSWORD_REQUIRE_SYMBOL: flag("false"),
    AUTH_SECURITY_ANSWER_MIN_LENGTH: z.coerce.number().int().min(1).default(2),
    AUTH_LOGIN_RATE_LIMIT_MAX_ATTEMPTS: z.coerce.number().default(10),
    AUTH_LOGIN_RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().default(60),
    AUTH_LOGIN_LOCKOUT_THRESHOLD: z.coerce.number().default(5),
    AUTH_LOGIN_LOCKOUT_SECONDS: z.coerce.number().default(300),
    AUTH_RESET_MAX_ATTEMPTS: z.coerce.number().default(5),
    AUTH_RESET_WINDOW_SECONDS: z.coerce.number().default(15 * 60),
    LOG_LEVEL: z.string().default("info"),
    LOG_PRETTY: flag("false"),
    CORS_ORIGINS: z
      .string()
      .default("http://localhost:3000")
      .transform(parseCorsOrigins),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});

export const DATABASE_URL = buildDatabaseUrl({
  host: env.MYSQL_HOST,
  port: env.MYSQL_PORT,
  database: env.MYSQL_DATABASE,
  user: env.MYSQL_USER,
  password: env.MYSQL_PASSWORD,
});
