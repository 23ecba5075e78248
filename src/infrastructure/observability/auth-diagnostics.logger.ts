import {
  type AuthDiagnosticsLogger,
  type CredentialFailureLog,
  type SessionRejectedLog,
} from "#/application/ports/observability";
import { logger } from "#/infrastructure/observability/logger";

export class PinoAuthDiagnosticsLogger implements AuthDiagnosticsLogger {
  logCredentialFailure(input: CredentialFailureLog): void {
    logger.info(
      {
        operation: input.operation,
        username: input.username,
        reason: input.reason,
      },
      "credential check failed",
    );
  }

  logSessionRejected(input: SessionRejectedLog): void {
    logger.debug({ status: input.status }, "session token rejected");
  }
}
