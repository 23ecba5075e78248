import { ValidationError } from "#/application/errors/validation";
import {
  type AccountRepository,
  type Clock,
  type PasswordHasher,
} from "#/application/ports/auth";
import {
  InvalidUsernameError,
  WeakPasswordError,
} from "#/application/use-cases/auth/errors";
import {
  type PasswordPolicy,
  type UsernamePolicy,
  checkPasswordStrength,
  checkUsername,
  normalizeUsername,
} from "#/domain/accounts/account";
import {
  type SecurityQuestionId,
  isSecurityQuestionId,
  normalizeSecurityAnswer,
} from "#/domain/accounts/security-question";

export interface SignupUserInput {
  username: string;
  password: string;
  securityQuestionId: string;
  securityAnswer: string;
}

export interface AccountView {
  username: string;
  securityQuestionId: SecurityQuestionId;
  createdAt: string;
}

export interface CredentialPolicy {
  username: UsernamePolicy;
  password: PasswordPolicy;
  securityAnswerMinLength: number;
}

interface SignupUserDeps {
  accountRepository: AccountRepository;
  passwordHasher: PasswordHasher;
  clock: Clock;
  policy: CredentialPolicy;
}

export const assertStrongPassword = (
  password: string,
  policy: PasswordPolicy,
  username: string,
): void => {
  const problems = checkPasswordStrength(password, policy, { username });
  const [first] = problems;
  if (first) {
    throw new WeakPasswordError(first, problems);
  }
};

export class SignupUserUseCase {
  constructor(private readonly deps: SignupUserDeps) {}

  async execute(input: SignupUserInput): Promise<AccountView> {
    const usernameProblem = checkUsername(
      input.username,
      this.deps.policy.username,
    );
    if (usernameProblem) {
      throw new InvalidUsernameError(usernameProblem);
    }
    const username = normalizeUsername(input.username);

    assertStrongPassword(input.password, this.deps.policy.password, username);

    if (!isSecurityQuestionId(input.securityQuestionId)) {
      throw new ValidationError("Unknown security question");
    }
    const answer = normalizeSecurityAnswer(input.securityAnswer);
    if (answer.length < this.deps.policy.securityAnswerMinLength) {
      throw new ValidationError(
        `Security answer must be at least ${this.deps.policy.securityAnswerMinLength} characters`,
      );
    }

    const { passwordHasher } = this.deps;
    const [passwordSalt, securityAnswerSalt] = await Promise.all([
      passwordHasher.generateSalt(),
      passwordHasher.generateSalt(),
    ]);
    const [passwordHash, securityAnswerHash] = await Promise.all([
      passwordHasher.hash(input.password, passwordSalt),
      passwordHasher.hash(answer, securityAnswerSalt),
    ]);

    const account = await this.deps.accountRepository.create({
      username,
      passwordHash,
      passwordSalt,
      securityQuestionId: input.securityQuestionId,
      securityAnswerHash,
      securityAnswerSalt,
      createdAt: new Date(this.deps.clock.nowSeconds() * 1000),
    });

    return {
      username: account.username,
      securityQuestionId: account.securityQuestionId,
      createdAt: account.createdAt.toISOString(),
    };
  }
}
