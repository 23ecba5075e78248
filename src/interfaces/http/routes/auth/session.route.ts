import { deleteCookie } from "hono/cookie";
import { describeRoute, resolver } from "hono-openapi";
import { z } from "zod";
import { UnauthorizedError } from "#/application/use-cases/auth";
import { setAction } from "#/interfaces/http/middleware/observability";
import { readSessionToken } from "#/interfaces/http/middleware/session";
import { unauthorized } from "#/interfaces/http/responses";
import {
  mapErrorToResponse,
  respondToRouteError,
} from "#/interfaces/http/routes/shared/error-handling";
import { unauthorizedResponse } from "#/interfaces/http/routes/shared/openapi-responses";
import {
  postAuthLogoutSchema,
  postAuthSessionValidateSchema,
} from "#/interfaces/http/validators/auth.schema";
import { validateJson } from "#/interfaces/http/validators/standard-validator";
import {
  type AuthMiddleware,
  type AuthRouter,
  type AuthRouterDeps,
  type AuthRouterUseCases,
  accountViewSchema,
  authTags,
} from "./shared";

const sessionErrorMappers = [
  mapErrorToResponse(UnauthorizedError, unauthorized),
];

export const registerAuthSessionRoutes = (args: {
  router: AuthRouter;
  deps: AuthRouterDeps;
  useCases: AuthRouterUseCases;
  sessionMiddleware: AuthMiddleware;
}) => {
  const { router, deps, useCases, sessionMiddleware } = args;

  router.post(
    "/session/validate",
    setAction("auth.session.validate", { route: "/auth/session/validate" }),
    validateJson(postAuthSessionValidateSchema),
    describeRoute({
      description: "Resolve a session token to its username",
      tags: authTags,
      responses: {
        200: {
          description: "Token is valid",
          content: {
            "application/json": {
              schema: resolver(z.object({ username: z.string() })),
            },
          },
        },
        401: unauthorizedResponse,
      },
    }),
    async (c) => {
      const { token } = c.req.valid("json");
      try {
        const result = await useCases.validateSession.execute({ token });
        c.set("username", result.username);
        return c.json(result);
      } catch (error) {
        return respondToRouteError(c, error, sessionErrorMappers);
      }
    },
  );

  router.post(
    "/logout",
    setAction("auth.session.logout", { route: "/auth/logout" }),
    validateJson(postAuthLogoutSchema),
    describeRoute({
      description:
        "End a session. Revokes the token when revocation is enabled; otherwise the client discards it.",
      tags: authTags,
      responses: {
        200: {
          description: "Logged out",
          content: {
            "application/json": {
              schema: resolver(
                z.object({
                  ok: z.literal(true),
                  mode: z.enum(["revoked", "client_discard"]),
                }),
              ),
            },
          },
        },
      },
    }),
    async (c) => {
      const { token: bodyToken } = c.req.valid("json");
      const token =
        bodyToken ?? readSessionToken(c, deps.sessionCookieName);
      const result = await useCases.logoutUser.execute({ token });
      deleteCookie(c, deps.sessionCookieName, { path: "/" });
      return c.json({ ok: true as const, mode: result.mode });
    },
  );

  router.get(
    "/me",
    setAction("auth.account.read", { route: "/auth/me" }),
    sessionMiddleware,
    describeRoute({
      description: "Get the account behind the current session",
      tags: authTags,
      responses: {
        200: {
          description: "Current account",
          content: {
            "application/json": { schema: resolver(accountViewSchema) },
          },
        },
        401: unauthorizedResponse,
      },
    }),
    async (c) => {
      try {
        const account = await useCases.getCurrentAccount.execute({
          username: c.get("username"),
        });
        return c.json(account);
      } catch (error) {
        return respondToRouteError(c, error, sessionErrorMappers);
      }
    },
  );
};
