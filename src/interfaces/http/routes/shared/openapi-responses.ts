import { resolver } from "hono-openapi";
import { errorResponseSchema } from "#/interfaces/http/responses";

const jsonErrorContent = {
  "application/json": {
    schema: resolver(errorResponseSchema),
  },
} as const;

export const errorResponse = (description: string) =>
  ({ description, content: jsonErrorContent }) as const;

export const invalidRequestResponse = errorResponse("Invalid request");

export const unauthorizedResponse = errorResponse("Unauthorized");

export const invalidCredentialsResponse = errorResponse("Invalid credentials");

export const tooManyRequestsResponse = errorResponse("Too many attempts");
