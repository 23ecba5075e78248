import { Scalar } from "@scalar/hono-api-reference";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { openAPIRouteHandler } from "hono-openapi";
import { env } from "#/env";
import { closeDbConnection } from "#/infrastructure/db/client";
import { logger } from "#/infrastructure/observability/logger";
import {
  type HttpContainer,
  type HttpContainerConfig,
  createHttpContainer,
} from "#/interfaces/http/container";
import {
  type ObservabilityVariables,
  requestId,
  requestLogger,
} from "#/interfaces/http/middleware/observability";
import { internalServerError } from "#/interfaces/http/responses";
import { createAuthRouter } from "#/interfaces/http/routes/auth";
import { healthRouter } from "#/interfaces/http/routes/health.route";
import packageJSON from "../../../package.json" with { type: "json" };

export const httpContainerConfigFromEnv = (): HttpContainerConfig => ({
  credentialStore: env.CREDENTIAL_STORE,
  jwtSecret: env.JWT_SECRET,
  jwtIssuer: env.JWT_ISSUER,
  tokenTtlSeconds: env.AUTH_TOKEN_TTL_SECONDS,
  bcryptRounds: env.BCRYPT_ROUNDS,
  logoutRevocation: env.AUTH_LOGOUT_REVOCATION,
  revocationSweepSeconds: env.AUTH_REVOCATION_SWEEP_SECONDS,
  sessionCookieName: env.AUTH_SESSION_COOKIE_NAME,
  policy: {
    username: {
      minLength: env.AUTH_USERNAME_MIN_LENGTH,
      maxLength: env.AUTH_USERNAME_MAX_LENGTH,
    },
    password: {
      minLength: env.AUTH_PASSWORD_MIN_LENGTH,
      requireLowercase: env.AUTH_PASSWORD_REQUIRE_LOWERCASE,
      requireUppercase: env.AUTH_PASSWORD_REQUIRE_UPPERCASE,
      requireDigit: env.AUTH_PASSWORD_REQUIRE_DIGIT,
      requireSymbol: env.AUTH_PASSWORD_REQUIRE_SYMBOL,
    },
    securityAnswerMinLength: env.AUTH_SECURITY_ANSWER_MIN_LENGTH,
  },
  rateLimits: {
    loginMaxAttempts: env.AUTH_LOGIN_RATE_LIMIT_MAX_ATTEMPTS,
    loginWindowSeconds: env.AUTH_LOGIN_RATE_LIMIT_WINDOW_SECONDS,
    loginLockoutThreshold: env.AUTH_LOGIN_LOCKOUT_THRESHOLD,
    loginLockoutSeconds: env.AUTH_LOGIN_LOCKOUT_SECONDS,
    resetMaxAttempts: env.AUTH_RESET_MAX_ATTEMPTS,
    resetWindowSeconds: env.AUTH_RESET_WINDOW_SECONDS,
  },
});

export const createHttpApp = (container: HttpContainer) => {
  const app = new Hono<{ Variables: ObservabilityVariables }>();

  app.use(
    "*",
    cors({
      origin: env.CORS_ORIGINS,
      credentials: true,
    }),
  );
  app.use("*", requestId());
  app.use("*", requestLogger);

  app.route("/", healthRouter);
  app.route("/auth", createAuthRouter(container.auth));

  app.onError((err, c) => {
    const status = err instanceof HTTPException ? err.status : 500;
    const logPayload = {
      err,
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
      status,
    };

    if (status >= 500) {
      logger.error(logPayload, "request error");
    } else {
      logger.warn(logPayload, "request error");
    }

    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    return internalServerError(c, "Unexpected error");
  });

  if (env.NODE_ENV !== "production") {
    app.get(
      "/openapi.json",
      openAPIRouteHandler(app, {
        documentation: {
          info: {
            title: `${packageJSON.name.toUpperCase()} API Reference`,
            description: packageJSON.description,
            version: packageJSON.version,
          },
          servers: [{ url: `http://localhost:${env.PORT}` }],
        },
      }),
    );

    app.get("/docs", Scalar({ url: "/openapi.json" }));
  }

  return app;
};

export const container = createHttpContainer(httpContainerConfigFromEnv());
export const app = createHttpApp(container);

export const startHttpBackgroundWorkers = async () => {
  await container.auth.dummyCredential.prepare();
  container.auth.authSecurityStore.startCleanup();
  container.background.revocationStore?.startCleanup(
    container.background.revocationSweepMs,
  );
};

export const stopHttpBackgroundWorkers = async () => {
  container.auth.authSecurityStore.stopCleanup();
  container.background.revocationStore?.stopCleanup();
  if (env.CREDENTIAL_STORE === "mysql") {
    await closeDbConnection();
  }
};
