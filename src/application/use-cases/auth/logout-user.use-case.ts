import { type TokenService } from "#/application/ports/auth";

/**
 * "revoked": the server refuses the token from now on.
 * "client_discard": tokens are stateless here; the caller must drop it, and it
 * stays valid until it expires.
 */
export type LogoutMode = "revoked" | "client_discard";

export interface LogoutResult {
  mode: LogoutMode;
}

export class LogoutUserUseCase {
  constructor(private readonly deps: { tokenService: TokenService }) {}

  async execute(input: { token: string | undefined }): Promise<LogoutResult> {
    if (!this.deps.tokenService.supportsRevocation) {
      return { mode: "client_discard" };
    }
    if (input.token) {
      await this.deps.tokenService.revoke(input.token);
    }
    return { mode: "revoked" };
  }
}
