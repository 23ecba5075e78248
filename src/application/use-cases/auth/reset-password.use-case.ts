import {
  type AccountRepository,
  type PasswordHasher,
} from "#/application/ports/auth";
import { type AuthDiagnosticsLogger } from "#/application/ports/observability";
import { type DummyCredential } from "#/application/use-cases/auth/dummy-credential";
import { InvalidCredentialsError } from "#/application/use-cases/auth/errors";
import { assertStrongPassword } from "#/application/use-cases/auth/signup-user.use-case";
import { type PasswordPolicy } from "#/domain/accounts/account";
import { normalizeSecurityAnswer } from "#/domain/accounts/security-question";

export interface ResetPasswordInput {
  username: string;
  securityAnswer: string;
  newPassword: string;
}

interface ResetPasswordDeps {
  accountRepository: AccountRepository;
  passwordHasher: PasswordHasher;
  dummyCredential: DummyCredential;
  passwordPolicy: PasswordPolicy;
  diagnostics: AuthDiagnosticsLogger;
}

export class ResetPasswordUseCase {
  constructor(private readonly deps: ResetPasswordDeps) {}

  async execute(input: ResetPasswordInput): Promise<void> {
    const answer = normalizeSecurityAnswer(input.securityAnswer);
    const account = await this.deps.accountRepository.findByUsername(
      input.username,
    );

    const verified = account
      ? await this.deps.passwordHasher.verify({
          secret: answer,
          salt: account.securityAnswerSalt,
          digest: account.securityAnswerHash,
        })
      : await this.deps.dummyCredential.verify(answer);

    if (!account || !verified) {
      this.deps.diagnostics.logCredentialFailure({
        operation: "reset_password",
        username: input.username,
        reason: account ? "wrong_secret" : "unknown_account",
      });
      throw new InvalidCredentialsError();
    }

    assertStrongPassword(
      input.newPassword,
      this.deps.passwordPolicy,
      account.username,
    );

    const passwordSalt = await this.deps.passwordHasher.generateSalt();
    const passwordHash = await this.deps.passwordHasher.hash(
      input.newPassword,
      passwordSalt,
    );
    await this.deps.accountRepository.updatePasswordHash(account.username, {
      passwordHash,
      passwordSalt,
    });
  }
}
