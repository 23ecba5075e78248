import { type TokenService } from "#/application/ports/auth";
import { type AuthDiagnosticsLogger } from "#/application/ports/observability";
import { UnauthorizedError } from "#/application/use-cases/auth/errors";

interface ValidateSessionDeps {
  tokenService: TokenService;
  diagnostics: AuthDiagnosticsLogger;
}

export class ValidateSessionUseCase {
  constructor(private readonly deps: ValidateSessionDeps) {}

  async execute(input: { token: string }): Promise<{ username: string }> {
    const result = await this.deps.tokenService.verify(input.token);
    if (result.status !== "valid") {
      this.deps.diagnostics.logSessionRejected({ status: result.status });
      throw new UnauthorizedError();
    }
    return { username: result.claims.subject };
  }
}
