import { setCookie } from "hono/cookie";
import { describeRoute, resolver } from "hono-openapi";
import { InvalidCredentialsError } from "#/application/use-cases/auth";
import { toUsernameKey } from "#/domain/accounts/account";
import { setAction } from "#/interfaces/http/middleware/observability";
import {
  invalidCredentials,
  tooManyRequests,
} from "#/interfaces/http/responses";
import {
  mapErrorToResponse,
  respondToRouteError,
} from "#/interfaces/http/routes/shared/error-handling";
import {
  invalidCredentialsResponse,
  invalidRequestResponse,
  tooManyRequestsResponse,
} from "#/interfaces/http/routes/shared/openapi-responses";
import { postAuthLoginSchema } from "#/interfaces/http/validators/auth.schema";
import { validateJson } from "#/interfaces/http/validators/standard-validator";
import {
  type AuthRouter,
  type AuthRouterDeps,
  type AuthRouterUseCases,
  authResponseSchema,
  authTags,
  resolveClientIp,
} from "./shared";

const loginErrorMappers = [
  mapErrorToResponse(InvalidCredentialsError, invalidCredentials),
];

export const registerAuthLoginRoute = (args: {
  router: AuthRouter;
  deps: AuthRouterDeps;
  useCases: AuthRouterUseCases;
}) => {
  const { router, deps, useCases } = args;
  const limits = deps.rateLimits;

  router.post(
    "/login",
    setAction("auth.session.login", { route: "/auth/login" }),
    validateJson(postAuthLoginSchema),
    describeRoute({
      description: "Authenticate credentials and issue a session token",
      tags: authTags,
      responses: {
        200: {
          description: "Authenticated",
          content: {
            "application/json": { schema: resolver(authResponseSchema) },
          },
        },
        401: invalidCredentialsResponse,
        422: invalidRequestResponse,
        429: tooManyRequestsResponse,
      },
    }),
    async (c) => {
      const payload = c.req.valid("json");
      const nowMs = Date.now();
      const usernameKey = toUsernameKey(payload.username);
      const ip = resolveClientIp({
        forwardedFor: c.req.header("x-forwarded-for"),
        realIp: c.req.header("x-real-ip"),
      });
      const loginKey = `${usernameKey}|${ip}`;

      if (!deps.authSecurityStore.checkLoginAllowed(loginKey, nowMs).allowed) {
        return tooManyRequests(
          c,
          "Too many failed login attempts. Try again later.",
        );
      }
      // Per-username window, whatever the client address.
      if (
        !deps.authSecurityStore.consumeEndpointAttempt({
          key: `login-username|${usernameKey}`,
          nowMs,
          windowSeconds: limits.loginWindowSeconds,
          maxAttempts: limits.loginMaxAttempts,
        })
      ) {
        return tooManyRequests(
          c,
          "Too many login attempts for this account. Try again later.",
        );
      }
      if (
        !deps.authSecurityStore.consumeEndpointAttempt({
          key: `login-window|${ip}`,
          nowMs,
          windowSeconds: limits.loginWindowSeconds,
          maxAttempts: limits.loginMaxAttempts,
        })
      ) {
        return tooManyRequests(c, "Too many login requests. Try again later.");
      }

      try {
        const result = await useCases.authenticateUser.execute(payload);
        deps.authSecurityStore.clearLoginFailures(loginKey);
        setCookie(c, deps.sessionCookieName, result.token, {
          httpOnly: true,
          secure: c.req.url.startsWith("https://"),
          sameSite: "Lax",
          path: "/",
          expires: new Date(result.expiresAt),
        });
        c.set("username", result.username);
        return c.json(result);
      } catch (error) {
        if (error instanceof InvalidCredentialsError) {
          deps.authSecurityStore.registerLoginFailure({
            key: loginKey,
            nowMs,
            windowSeconds: limits.loginWindowSeconds,
            lockoutThreshold: limits.loginLockoutThreshold,
            lockoutSeconds: limits.loginLockoutSeconds,
          });
        }
        return respondToRouteError(c, error, loginErrorMappers);
      }
    },
  );
};
