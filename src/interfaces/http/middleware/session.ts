import { type Context, type MiddlewareHandler } from "hono";
import { getCookie } from "hono/cookie";
import {
  UnauthorizedError,
  type ValidateSessionUseCase,
} from "#/application/use-cases/auth";
import { unauthorized } from "#/interfaces/http/responses";

export type SessionVariables = {
  username: string;
  sessionToken: string;
  action?: string;
  route?: string;
};

export const extractBearerToken = (
  authorizationHeader: string | undefined,
): string | undefined => {
  if (!authorizationHeader) return undefined;
  const [scheme, value] = authorizationHeader.split(" ");
  if (scheme?.toLowerCase() !== "bearer" || !value) {
    return undefined;
  }
  return value;
};

/** Bearer header wins over the session cookie. */
export const readSessionToken = (
  c: Context,
  cookieName: string,
): string | undefined =>
  extractBearerToken(c.req.header("authorization")) ??
  getCookie(c, cookieName);

export const createSessionMiddleware = (deps: {
  validateSession: ValidateSessionUseCase;
  cookieName: string;
}): MiddlewareHandler<{ Variables: SessionVariables }> => {
  return async (c, next) => {
    const token = readSessionToken(c, deps.cookieName);
    if (!token) {
      return unauthorized(c, "Unauthorized");
    }

    try {
      const { username } = await deps.validateSession.execute({ token });
      c.set("username", username);
      c.set("sessionToken", token);
    } catch (error) {
      if (error instanceof UnauthorizedError) {
        return unauthorized(c, "Unauthorized");
      }
      throw error;
    }

    await next();
  };
};
