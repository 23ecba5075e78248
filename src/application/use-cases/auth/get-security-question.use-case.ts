import { createHmac } from "node:crypto";
import { type AccountRepository } from "#/application/ports/auth";
import { toUsernameKey } from "#/domain/accounts/account";
import {
  SECURITY_QUESTIONS,
  SECURITY_QUESTION_IDS,
  type SecurityQuestionId,
} from "#/domain/accounts/security-question";

export interface SecurityQuestionView {
  questionId: SecurityQuestionId;
  prompt: string;
}

/**
 * Picks a stable question for usernames with no account, so the reply looks
 * the same whether or not the account exists.
 */
export const pickDecoyQuestion = (
  username: string,
  secret: string,
): SecurityQuestionId => {
  const digest = createHmac("sha256", secret)
    .update(toUsernameKey(username))
    .digest();
  const index = digest.readUInt32BE(0) % SECURITY_QUESTION_IDS.length;
  return SECURITY_QUESTION_IDS[index] ?? "Q_PET";
};

export class GetSecurityQuestionUseCase {
  constructor(
    private readonly deps: {
      accountRepository: AccountRepository;
      decoySecret: string;
    },
  ) {}

  async execute(input: { username: string }): Promise<SecurityQuestionView> {
    const account = await this.deps.accountRepository.findByUsername(
      input.username,
    );
    const questionId =
      account?.securityQuestionId ??
      pickDecoyQuestion(input.username, this.deps.decoySecret);
    return { questionId, prompt: SECURITY_QUESTIONS[questionId] };
  }
}
