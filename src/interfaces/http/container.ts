import { type AccountRepository } from "#/application/ports/auth";
import {
  type CredentialPolicy,
  DummyCredential,
} from "#/application/use-cases/auth";
import { InMemoryAccountRepository } from "#/infrastructure/accounts/in-memory-account.repo";
import { BcryptPasswordHasher } from "#/infrastructure/auth/bcrypt-password.hasher";
import { InMemoryTokenRevocationStore } from "#/infrastructure/auth/in-memory-token-revocation.store";
import { JwtTokenService, createSigningKey } from "#/infrastructure/auth/jwt";
import { AccountDbRepository } from "#/infrastructure/db/repositories/account.repo";
import { PinoAuthDiagnosticsLogger } from "#/infrastructure/observability/auth-diagnostics.logger";
import { SystemClock } from "#/infrastructure/time/system.clock";
import { type AuthRateLimits, type AuthRouterDeps } from "#/interfaces/http/routes/auth";
import { InMemoryAuthSecurityStore } from "#/interfaces/http/security/in-memory-auth-security.store";

export interface HttpContainerConfig {
  credentialStore: "memory" | "mysql";
  jwtSecret: string;
  jwtIssuer: string;
  tokenTtlSeconds: number;
  bcryptRounds: number;
  logoutRevocation: boolean;
  revocationSweepSeconds: number;
  sessionCookieName: string;
  policy: CredentialPolicy;
  rateLimits: AuthRateLimits;
}

export interface HttpContainer {
  auth: AuthRouterDeps;
  background: {
    revocationStore: InMemoryTokenRevocationStore | null;
    revocationSweepMs: number;
  };
}

const createAccountRepository = (
  store: HttpContainerConfig["credentialStore"],
): AccountRepository =>
  store === "mysql" ? new AccountDbRepository() : new InMemoryAccountRepository();

export const createHttpContainer = (
  config: HttpContainerConfig,
): HttpContainer => {
  const clock = new SystemClock();
  const passwordHasher = new BcryptPasswordHasher({
    rounds: config.bcryptRounds,
  });
  const revocationStore = config.logoutRevocation
    ? new InMemoryTokenRevocationStore()
    : null;

  const tokenService = new JwtTokenService({
    signingKey: createSigningKey({
      secret: config.jwtSecret,
      issuer: config.jwtIssuer,
    }),
    clock,
    tokenTtlSeconds: config.tokenTtlSeconds,
    revocationStore: revocationStore ?? undefined,
  });

  return {
    auth: {
      accountRepository: createAccountRepository(config.credentialStore),
      passwordHasher,
      dummyCredential: new DummyCredential(passwordHasher),
      tokenService,
      clock,
      policy: config.policy,
      decoySecret: config.jwtSecret,
      diagnostics: new PinoAuthDiagnosticsLogger(),
      authSecurityStore: new InMemoryAuthSecurityStore(),
      rateLimits: config.rateLimits,
      sessionCookieName: config.sessionCookieName,
    },
    background: {
      revocationStore,
      revocationSweepMs: config.revocationSweepSeconds * 1000,
    },
  };
};
