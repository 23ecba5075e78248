import { type Context } from "hono";
import { z } from "zod";

export type ResponseContext = Pick<Context, "json">;

export const apiFieldErrorSchema = z.object({
  field: z.string(),
  message: z.string(),
  code: z.string(),
});

export const errorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.array(apiFieldErrorSchema).optional(),
  }),
});

export interface ApiFieldError {
  field: string;
  message: string;
  code: string;
}

export type ErrorResponse = z.infer<typeof errorResponseSchema>;

export const okResponseSchema = z.object({ ok: z.literal(true) });

const isObject = (value: unknown): value is Record<string, unknown> =>
  value != null && typeof value === "object" && !Array.isArray(value);

const buildErrorPayload = (
  code: string,
  message: string,
  details: ApiFieldError[] = [],
): ErrorResponse => ({
  error: {
    code,
    message,
    ...(details.length > 0 ? { details } : {}),
  },
});

export const parseValidationDetails = (
  issues: readonly unknown[] | undefined,
): ApiFieldError[] => {
  if (!Array.isArray(issues) || issues.length === 0) {
    return [];
  }

  return issues.map((issue) => {
    if (!isObject(issue)) {
      return {
        field: "body",
        message: String(issue),
        code: "invalid_value",
      };
    }

    const path = Array.isArray(issue.path)
      ? issue.path
          .map((segment) =>
            isObject(segment) && "key" in segment
              ? String(segment.key)
              : String(segment),
          )
          .join(".")
      : "body";

    return {
      field: path || "body",
      message: String(issue.message ?? "Invalid value"),
      code: String(issue.code ?? "invalid_value"),
    };
  });
};

export const badRequest = (c: ResponseContext, message: string) =>
  c.json<ErrorResponse>(buildErrorPayload("INVALID_REQUEST", message), 400);

export const validationError = (
  c: ResponseContext,
  message: string,
  details: ApiFieldError[] = [],
) =>
  c.json<ErrorResponse>(
    buildErrorPayload("VALIDATION_ERROR", message, details),
    422,
  );

export const invalidUsername = (c: ResponseContext, message: string) =>
  c.json<ErrorResponse>(buildErrorPayload("INVALID_USERNAME", message), 400);

export const weakPassword = (c: ResponseContext, message: string) =>
  c.json<ErrorResponse>(buildErrorPayload("WEAK_PASSWORD", message), 400);

export const duplicateUsername = (c: ResponseContext, message: string) =>
  c.json<ErrorResponse>(buildErrorPayload("DUPLICATE_USERNAME", message), 409);

export const invalidCredentials = (c: ResponseContext, message: string) =>
  c.json<ErrorResponse>(buildErrorPayload("INVALID_CREDENTIALS", message), 401);

export const unauthorized = (c: ResponseContext, message: string) =>
  c.json<ErrorResponse>(buildErrorPayload("UNAUTHORIZED", message), 401);

export const notFound = (c: ResponseContext, message: string) =>
  c.json<ErrorResponse>(buildErrorPayload("NOT_FOUND", message), 404);

export const tooManyRequests = (c: ResponseContext, message: string) =>
  c.json<ErrorResponse>(buildErrorPayload("TOO_MANY_REQUESTS", message), 429);

export const internalServerError = (c: ResponseContext, message: string) =>
  c.json<ErrorResponse>(buildErrorPayload("INTERNAL_ERROR", message), 500);
