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

/**
 * Accounts keyed by lower-cased username. Every method does its read and
 * write in one synchronous step, which makes each call atomic per key.
 */
export class InMemoryAccountRepository implements AccountRepository {
  private readonly accounts = new Map<string, AccountRecord>();

  async create(account: Account): Promise<AccountRecord> {
    const key = toUsernameKey(account.username);
    if (!key) {
      throw new InvalidUsernameError("Username is required");
    }
    if (this.accounts.has(key)) {
      throw new DuplicateUsernameError();
    }
    const record: AccountRecord = { ...account };
    this.accounts.set(key, record);
    return { ...record };
  }

  async findByUsername(username: string): Promise<AccountRecord | null> {
    const record = this.accounts.get(toUsernameKey(username));
    return record ? { ...record } : null;
  }

  async updatePasswordHash(
    username: string,
    credentials: { passwordHash: string; passwordSalt: string },
  ): Promise<void> {
    const key = toUsernameKey(username);
    const record = this.accounts.get(key);
    if (!record) {
      throw new NotFoundError("Account not found");
    }
    this.accounts.set(key, {
      ...record,
      passwordHash: credentials.passwordHash,
      passwordSalt: credentials.passwordSalt,
    });
  }
}
