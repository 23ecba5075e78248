import { z } from "zod";
import { isSecurityQuestionId } from "#/domain/accounts/security-question";

// Upper bounds only cap request size; the password policy applies its own.
const username = z.string().min(1, "Username is required").max(128);
const secret = z.string().min(1).max(512);

export const postAuthSignupSchema = z.object({
  username,
  password: secret,
  securityQuestionId: z
    .string()
    .refine(isSecurityQuestionId, "Unknown security question"),
  securityAnswer: z.string().min(1, "Security answer is required").max(256),
});

export const postAuthLoginSchema = z.object({
  username,
  password: secret,
});

export const postAuthSessionValidateSchema = z.object({
  token: z.string().min(1),
});

export const postAuthLogoutSchema = z.object({
  token: z.string().min(1).optional(),
});

export const postAuthResetPasswordSchema = z.object({
  username,
  securityAnswer: z.string().min(1).max(256),
  newPassword: secret,
});

export const getAuthSecurityQuestionQuerySchema = z.object({
  username,
});
