import { describeRoute, resolver } from "hono-openapi";
import { z } from "zod";
import {
  DuplicateUsernameError,
  InvalidUsernameError,
  WeakPasswordError,
} from "#/application/use-cases/auth";
import { setAction } from "#/interfaces/http/middleware/observability";
import {
  duplicateUsername,
  invalidUsername,
  weakPassword,
} from "#/interfaces/http/responses";
import {
  applicationErrorMappers,
  mapErrorToResponse,
  respondToRouteError,
} from "#/interfaces/http/routes/shared/error-handling";
import {
  errorResponse,
  invalidRequestResponse,
} from "#/interfaces/http/routes/shared/openapi-responses";
import { postAuthSignupSchema } from "#/interfaces/http/validators/auth.schema";
import { validateJson } from "#/interfaces/http/validators/standard-validator";
import {
  type AuthRouter,
  type AuthRouterUseCases,
  accountViewSchema,
  authTags,
} from "./shared";

const signupErrorMappers = [
  mapErrorToResponse(InvalidUsernameError, invalidUsername),
  mapErrorToResponse(WeakPasswordError, weakPassword),
  mapErrorToResponse(DuplicateUsernameError, duplicateUsername),
  ...applicationErrorMappers,
];

export const registerAuthSignupRoute = (args: {
  router: AuthRouter;
  useCases: AuthRouterUseCases;
}) => {
  const { router, useCases } = args;

  router.post(
    "/signup",
    setAction("auth.account.signup", { route: "/auth/signup" }),
    validateJson(postAuthSignupSchema),
    describeRoute({
      description: "Register an account with a password and security question",
      tags: authTags,
      responses: {
        201: {
          description: "Account created",
          content: {
            "application/json": {
              schema: resolver(
                z.object({ ok: z.literal(true), account: accountViewSchema }),
              ),
            },
          },
        },
        400: errorResponse("Invalid username or weak password"),
        409: errorResponse("Username already taken"),
        422: invalidRequestResponse,
      },
    }),
    async (c) => {
      const payload = c.req.valid("json");
      try {
        const account = await useCases.signupUser.execute(payload);
        c.set("username", account.username);
        return c.json({ ok: true as const, account }, 201);
      } catch (error) {
        return respondToRouteError(c, error, signupErrorMappers);
      }
    },
  );
};
