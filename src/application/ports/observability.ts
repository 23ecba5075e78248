import { type TokenFailureStatus } from "#/application/ports/auth";

export interface CredentialFailureLog {
  operation: "login" | "reset_password";
  username: string;
  reason: "unknown_account" | "wrong_secret";
}

export interface SessionRejectedLog {
  status: TokenFailureStatus;
}

/**
 * Diagnostics kept out of responses: callers only ever see the collapsed
 * InvalidCredentials / Unauthorized outcomes.
 */
export interface AuthDiagnosticsLogger {
  logCredentialFailure(input: CredentialFailureLog): void;
  logSessionRejected(input: SessionRejectedLog): void;
}
