import { Hono } from "hono";
import { createSessionMiddleware } from "#/interfaces/http/middleware/session";
import { registerAuthLoginRoute } from "./login.route";
import { registerAuthPasswordResetRoutes } from "./password-reset.route";
import { registerAuthSessionRoutes } from "./session.route";
import {
  type AuthEnv,
  type AuthRouterDeps,
  createAuthUseCases,
} from "./shared";
import { registerAuthSignupRoute } from "./signup.route";

export type { AuthRateLimits, AuthRouterDeps } from "./shared";

export const createAuthRouter = (deps: AuthRouterDeps) => {
  const router = new Hono<AuthEnv>();
  const useCases = createAuthUseCases(deps);
  const sessionMiddleware = createSessionMiddleware({
    validateSession: useCases.validateSession,
    cookieName: deps.sessionCookieName,
  });

  registerAuthSignupRoute({ router, useCases });
  registerAuthLoginRoute({ router, deps, useCases });
  registerAuthSessionRoutes({ router, deps, useCases, sessionMiddleware });
  registerAuthPasswordResetRoutes({ router, deps, useCases });

  return router;
};
