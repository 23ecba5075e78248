import { type Account } from "#/domain/accounts/account";

export type AccountRecord = Account;

export interface AccountRepository {
  /** Atomic check-and-insert; throws DuplicateUsernameError when taken. */
  create(account: Account): Promise<AccountRecord>;
  findByUsername(username: string): Promise<AccountRecord | null>;
  /** Throws NotFoundError when no account matches. */
  updatePasswordHash(
    username: string,
    credentials: { passwordHash: string; passwordSalt: string },
  ): Promise<void>;
}

export interface PasswordHasher {
  generateSalt(): Promise<string>;
  hash(secret: string, salt: string): Promise<string>;
  verify(input: { secret: string; salt: string; digest: string }): Promise<boolean>;
}

export interface SessionClaims {
  subject: string;
  tokenId: string;
  issuedAt: number;
  expiresAt: number;
}

export interface IssuedSessionToken extends SessionClaims {
  token: string;
}

export type TokenFailureStatus =
  | "expired"
  | "invalid_signature"
  | "revoked"
  | "malformed";

export type TokenVerification =
  | { status: "valid"; claims: SessionClaims }
  | { status: TokenFailureStatus };

export interface TokenService {
  issue(subject: string): Promise<IssuedSessionToken>;
  verify(token: string): Promise<TokenVerification>;
  /** Returns false when there was nothing to revoke (already expired, forged...). */
  revoke(token: string): Promise<boolean>;
  readonly supportsRevocation: boolean;
}

export interface TokenRevocationStore {
  revoke(tokenId: string, expiresAtMs: number): void;
  isRevoked(tokenId: string, nowMs: number): boolean;
  sweep(nowMs: number): number;
  readonly size: number;
}

export interface Clock {
  nowSeconds(): number;
}
