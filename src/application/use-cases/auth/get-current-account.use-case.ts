import { type AccountRepository } from "#/application/ports/auth";
import { UnauthorizedError } from "#/application/use-cases/auth/errors";
import { type AccountView } from "#/application/use-cases/auth/signup-user.use-case";

export class GetCurrentAccountUseCase {
  constructor(
    private readonly deps: { accountRepository: AccountRepository },
  ) {}

  async execute(input: { username: string }): Promise<AccountView> {
    const account = await this.deps.accountRepository.findByUsername(
      input.username,
    );
    // A valid token for an account that no longer resolves is still no session.
    if (!account) {
      throw new UnauthorizedError();
    }
    return {
      username: account.username,
      securityQuestionId: account.securityQuestionId,
      createdAt: account.createdAt.toISOString(),
    };
  }
}
