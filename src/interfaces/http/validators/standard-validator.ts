import { type StandardSchemaV1 } from "@standard-schema/spec";
import { type Context } from "hono";
import { validator } from "hono-openapi";
import {
  parseValidationDetails,
  validationError,
} from "#/interfaces/http/responses";

type ValidatedTarget = "json" | "query";

type ValidationHookResult =
  | { success: true; data: unknown; target: string; error?: never }
  | {
      success: false;
      data: unknown;
      target: string;
      error: readonly StandardSchemaV1.Issue[];
    };

const messages: Record<ValidatedTarget, string> = {
  json: "Invalid request",
  query: "Invalid query parameters",
};

// Rejections answer 422 with one detail per failing field.
const rejectInvalid =
  (target: ValidatedTarget) =>
  (result: ValidationHookResult, c: Context): Response | undefined =>
    result.success
      ? undefined
      : validationError(
          c,
          messages[target],
          parseValidationDetails(result.error),
        );

export const validateJson = <Schema extends StandardSchemaV1>(schema: Schema) =>
  validator("json", schema, rejectInvalid("json"));

export const validateQuery = <Schema extends StandardSchemaV1>(
  schema: Schema,
) => validator("query", schema, rejectInvalid("query"));
