import { NotFoundError } from "#/application/errors/not-found";
import { ValidationError } from "#/application/errors/validation";
import {
  type ResponseContext,
  badRequest,
  notFound,
} from "#/interfaces/http/responses";

export type ErrorMapper = (c: ResponseContext, error: unknown) => Response | null;

// Constructor args vary across Error subclasses.
type ErrorClass = new (...args: never[]) => Error;

export const mapErrorToResponse = (
  ErrorType: ErrorClass,
  responder: (c: ResponseContext, message: string) => Response,
): ErrorMapper => {
  return (c, error) => {
    if (error instanceof ErrorType) {
      return responder(c, error.message);
    }
    return null;
  };
};

export const applicationErrorMappers: readonly ErrorMapper[] = [
  mapErrorToResponse(ValidationError, badRequest),
  mapErrorToResponse(NotFoundError, notFound),
];

/** Answers with the first matching mapper; unmapped errors reach app.onError. */
export const respondToRouteError = (
  c: ResponseContext,
  error: unknown,
  mappers: readonly ErrorMapper[],
): Response => {
  for (const mapper of mappers) {
    const response = mapper(c, error);
    if (response != null) {
      return response;
    }
  }
  throw error;
};
