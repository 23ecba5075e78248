import {
  type AccountRepository,
  type PasswordHasher,
  type TokenService,
} from "#/application/ports/auth";
import { type AuthDiagnosticsLogger } from "#/application/ports/observability";
import { type DummyCredential } from "#/application/use-cases/auth/dummy-credential";
import { InvalidCredentialsError } from "#/application/use-cases/auth/errors";

export interface AuthenticateUserInput {
  username: string;
  password: string;
}

export interface AuthResult {
  type: "bearer";
  token: string;
  expiresAt: string;
  username: string;
}

interface AuthenticateUserDeps {
  accountRepository: AccountRepository;
  passwordHasher: PasswordHasher;
  dummyCredential: DummyCredential;
  tokenService: TokenService;
  diagnostics: AuthDiagnosticsLogger;
}

export class AuthenticateUserUseCase {
  constructor(private readonly deps: AuthenticateUserDeps) {}

  async execute(input: AuthenticateUserInput): Promise<AuthResult> {
    const account = await this.deps.accountRepository.findByUsername(
      input.username,
    );

    const verified = account
      ? await this.deps.passwordHasher.verify({
          secret: input.password,
          salt: account.passwordSalt,
          digest: account.passwordHash,
        })
      : await this.deps.dummyCredential.verify(input.password);

    if (!account || !verified) {
      this.deps.diagnostics.logCredentialFailure({
        operation: "login",
        username: input.username,
        reason: account ? "wrong_secret" : "unknown_account",
      });
      throw new InvalidCredentialsError();
    }

    const issued = await this.deps.tokenService.issue(account.username);

    return {
      type: "bearer",
      token: issued.token,
      expiresAt: new Date(issued.expiresAt * 1000).toISOString(),
      username: account.username,
    };
  }
}
