import { eq } from "drizzle-orm";
import { NotFoundError } from "#/application/errors/not-found";
import {
  type AccountRecord,
  type AccountRepository,
} from "#/application/ports/auth";
import {
  DuplicateUsernameError,
  InvalidUsernameError,
} from "#/application/use-cases/auth/errors";
import { type Account, toUsernameKey } from "#/domain/accounts/account";
import { isSecurityQuestionId } from "#/domain/accounts/security-question";
import { db } from "#/infrastructure/db/client";
import { accounts } from "#/infrastructure/db/schema/account.sql";

export const mapAccountInsertError = (error: unknown): Error => {
  if (!(error instanceof Error)) {
    return new Error("Unable to create account");
  }
  const code = "code" in error ? error.code : undefined;
  const errno = "errno" in error ? error.errno : undefined;
  if (code === "ER_DUP_ENTRY" || errno === 1062) {
    return new DuplicateUsernameError();
  }
  return error;
};

export const toAccountRecord = (
  row: typeof accounts.$inferSelect,
): AccountRecord => {
  if (!isSecurityQuestionId(row.securityQuestionId)) {
    throw new Error(
      `Account ${row.usernameKey} has unknown security question ${row.securityQuestionId}`,
    );
  }
  return {
    username: row.username,
    passwordHash: row.passwordHash,
    passwordSalt: row.passwordSalt,
    securityQuestionId: row.securityQuestionId,
    securityAnswerHash: row.securityAnswerHash,
    securityAnswerSalt: row.securityAnswerSalt,
    createdAt: row.createdAt,
  };
};

export class AccountDbRepository implements AccountRepository {
  async create(account: Account): Promise<AccountRecord> {
    const usernameKey = toUsernameKey(account.username);
    if (!usernameKey) {
      throw new InvalidUsernameError("Username is required");
    }
    try {
      // Primary key on username_key: a concurrent duplicate loses the insert.
      await db.insert(accounts).values({
        usernameKey,
        ...account,
      });
    } catch (error) {
      throw mapAccountInsertError(error);
    }
    return { ...account };
  }

  async findByUsername(username: string): Promise<AccountRecord | null> {
    const result = await db
      .select()
      .from(accounts)
      .where(eq(accounts.usernameKey, toUsernameKey(username)))
      .limit(1);
    return result[0] ? toAccountRecord(result[0]) : null;
  }

  async updatePasswordHash(
    username: string,
    credentials: { passwordHash: string; passwordSalt: string },
  ): Promise<void> {
    const result = await db
      .update(accounts)
      .set({
        passwordHash: credentials.passwordHash,
        passwordSalt: credentials.passwordSalt,
      })
      .where(eq(accounts.usernameKey, toUsernameKey(username)));
    if (result[0].affectedRows === 0) {
      throw new NotFoundError("Account not found");
    }
  }
}
