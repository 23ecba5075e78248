import { describeRoute, resolver } from "hono-openapi";
import { z } from "zod";
import {
  InvalidCredentialsError,
  WeakPasswordError,
} from "#/application/use-cases/auth";
import { toUsernameKey } from "#/domain/accounts/account";
import { listSecurityQuestions } from "#/domain/accounts/security-question";
import { setAction } from "#/interfaces/http/middleware/observability";
import {
  invalidCredentials,
  okResponseSchema,
  tooManyRequests,
  weakPassword,
} from "#/interfaces/http/responses";
import {
  applicationErrorMappers,
  mapErrorToResponse,
  respondToRouteError,
} from "#/interfaces/http/routes/shared/error-handling";
import {
  errorResponse,
  invalidCredentialsResponse,
  invalidRequestResponse,
  tooManyRequestsResponse,
} from "#/interfaces/http/routes/shared/openapi-responses";
import {
  getAuthSecurityQuestionQuerySchema,
  postAuthResetPasswordSchema,
} from "#/interfaces/http/validators/auth.schema";
import {
  validateJson,
  validateQuery,
} from "#/interfaces/http/validators/standard-validator";
import {
  type AuthRouter,
  type AuthRouterDeps,
  type AuthRouterUseCases,
  authTags,
} from "./shared";

const resetErrorMappers = [
  mapErrorToResponse(InvalidCredentialsError, invalidCredentials),
  mapErrorToResponse(WeakPasswordError, weakPassword),
  ...applicationErrorMappers,
];

const securityQuestionSchema = z.object({
  id: z.string(),
  prompt: z.string(),
});

export const registerAuthPasswordResetRoutes = (args: {
  router: AuthRouter;
  deps: AuthRouterDeps;
  useCases: AuthRouterUseCases;
}) => {
  const { router, deps, useCases } = args;

  router.get(
    "/security-questions",
    setAction("auth.security-question.list", {
      route: "/auth/security-questions",
    }),
    describeRoute({
      description: "List the security questions offered at signup",
      tags: authTags,
      responses: {
        200: {
          description: "Security questions",
          content: {
            "application/json": {
              schema: resolver(
                z.object({ questions: z.array(securityQuestionSchema) }),
              ),
            },
          },
        },
      },
    }),
    (c) => c.json({ questions: listSecurityQuestions() }),
  );

  router.get(
    "/security-question",
    setAction("auth.security-question.read", {
      route: "/auth/security-question",
    }),
    validateQuery(getAuthSecurityQuestionQuerySchema),
    describeRoute({
      description:
        "Get the security question to answer for a password reset. Unknown usernames get a stable stand-in question.",
      tags: authTags,
      responses: {
        200: {
          description: "Security question",
          content: {
            "application/json": {
              schema: resolver(
                z.object({ questionId: z.string(), prompt: z.string() }),
              ),
            },
          },
        },
        422: invalidRequestResponse,
      },
    }),
    async (c) => {
      const { username } = c.req.valid("query");
      return c.json(await useCases.getSecurityQuestion.execute({ username }));
    },
  );

  router.post(
    "/reset-password",
    setAction("auth.password.reset", { route: "/auth/reset-password" }),
    validateJson(postAuthResetPasswordSchema),
    describeRoute({
      description: "Reset a password by answering the security question",
      tags: authTags,
      responses: {
        200: {
          description: "Password reset complete",
          content: {
            "application/json": { schema: resolver(okResponseSchema) },
          },
        },
        400: errorResponse("New password too weak"),
        401: invalidCredentialsResponse,
        429: tooManyRequestsResponse,
      },
    }),
    async (c) => {
      const payload = c.req.valid("json");
      const allowed = deps.authSecurityStore.consumeEndpointAttempt({
        key: `reset|${toUsernameKey(payload.username)}`,
        nowMs: Date.now(),
        windowSeconds: deps.rateLimits.resetWindowSeconds,
        maxAttempts: deps.rateLimits.resetMaxAttempts,
      });
      if (!allowed) {
        return tooManyRequests(
          c,
          "Too many password reset attempts. Try again later.",
        );
      }

      try {
        await useCases.resetPassword.execute(payload);
        return c.json({ ok: true as const });
      } catch (error) {
        return respondToRouteError(c, error, resetErrorMappers);
      }
    },
  );
};
