import { type Hono, type MiddlewareHandler } from "hono";
import { z } from "zod";
import {
  type AccountRepository,
  type Clock,
  type PasswordHasher,
  type TokenService,
} from "#/application/ports/auth";
import { type AuthDiagnosticsLogger } from "#/application/ports/observability";
import {
  AuthenticateUserUseCase,
  type CredentialPolicy,
  type DummyCredential,
  GetCurrentAccountUseCase,
  GetSecurityQuestionUseCase,
  LogoutUserUseCase,
  ResetPasswordUseCase,
  SignupUserUseCase,
  ValidateSessionUseCase,
} from "#/application/use-cases/auth";
import { type ObservabilityVariables } from "#/interfaces/http/middleware/observability";
import { type SessionVariables } from "#/interfaces/http/middleware/session";
import { type InMemoryAuthSecurityStore } from "#/interfaces/http/security/in-memory-auth-security.store";

export interface AuthRateLimits {
  loginMaxAttempts: number;
  loginWindowSeconds: number;
  loginLockoutThreshold: number;
  loginLockoutSeconds: number;
  resetMaxAttempts: number;
  resetWindowSeconds: number;
}

export interface AuthRouterDeps {
  accountRepository: AccountRepository;
  passwordHasher: PasswordHasher;
  dummyCredential: DummyCredential;
  tokenService: TokenService;
  clock: Clock;
  policy: CredentialPolicy;
  decoySecret: string;
  diagnostics: AuthDiagnosticsLogger;
  authSecurityStore: InMemoryAuthSecurityStore;
  rateLimits: AuthRateLimits;
  sessionCookieName: string;
}

export interface AuthRouterUseCases {
  signupUser: SignupUserUseCase;
  authenticateUser: AuthenticateUserUseCase;
  validateSession: ValidateSessionUseCase;
  logoutUser: LogoutUserUseCase;
  resetPassword: ResetPasswordUseCase;
  getSecurityQuestion: GetSecurityQuestionUseCase;
  getCurrentAccount: GetCurrentAccountUseCase;
}

export type AuthEnv = {
  Variables: ObservabilityVariables & Partial<SessionVariables>;
};

export type AuthRouter = Hono<AuthEnv>;

export type AuthMiddleware = MiddlewareHandler<{ Variables: SessionVariables }>;

export const authTags = ["Auth"];

export const accountViewSchema = z.object({
  username: z.string(),
  securityQuestionId: z.string(),
  createdAt: z.string(),
});

export const authResponseSchema = z.object({
  type: z.literal("bearer"),
  token: z.string(),
  expiresAt: z.string(),
  username: z.string(),
});

export const createAuthUseCases = (
  deps: AuthRouterDeps,
): AuthRouterUseCases => {
  return {
    signupUser: new SignupUserUseCase({
      accountRepository: deps.accountRepository,
      passwordHasher: deps.passwordHasher,
      clock: deps.clock,
      policy: deps.policy,
    }),
    authenticateUser: new AuthenticateUserUseCase({
      accountRepository: deps.accountRepository,
      passwordHasher: deps.passwordHasher,
      dummyCredential: deps.dummyCredential,
      tokenService: deps.tokenService,
      diagnostics: deps.diagnostics,
    }),
    validateSession: new ValidateSessionUseCase({
      tokenService: deps.tokenService,
      diagnostics: deps.diagnostics,
    }),
    logoutUser: new LogoutUserUseCase({ tokenService: deps.tokenService }),
    resetPassword: new ResetPasswordUseCase({
      accountRepository: deps.accountRepository,
      passwordHasher: deps.passwordHasher,
      dummyCredential: deps.dummyCredential,
      passwordPolicy: deps.policy.password,
      diagnostics: deps.diagnostics,
    }),
    getSecurityQuestion: new GetSecurityQuestionUseCase({
      accountRepository: deps.accountRepository,
      decoySecret: deps.decoySecret,
    }),
    getCurrentAccount: new GetCurrentAccountUseCase({
      accountRepository: deps.accountRepository,
    }),
  };
};

export const resolveClientIp = (headers: {
  forwardedFor?: string;
  realIp?: string;
}): string => {
  const forwarded = headers.forwardedFor?.split(",")[0]?.trim();
  if (forwarded) return forwarded;
  return headers.realIp?.trim() || "unknown";
};
