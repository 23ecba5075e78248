import { type TokenRevocationStore } from "#/application/ports/auth";

/**
 * Process-wide revocation set: token id -> token expiry (ms).
 * An entry is dropped once its token would have expired anyway.
 */
export class InMemoryTokenRevocationStore implements TokenRevocationStore {
  private readonly revoked = new Map<string, number>();
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;

  revoke(tokenId: string, expiresAtMs: number): void {
    this.revoked.set(tokenId, expiresAtMs);
  }

  isRevoked(tokenId: string, nowMs: number): boolean {
    const expiresAtMs = this.revoked.get(tokenId);
    if (expiresAtMs === undefined) {
      return false;
    }
    if (expiresAtMs <= nowMs) {
      this.revoked.delete(tokenId);
      return false;
    }
    return true;
  }

  /** @returns number of entries removed */
  sweep(nowMs: number): number {
    let removed = 0;
    for (const [tokenId, expiresAtMs] of this.revoked) {
      if (expiresAtMs <= nowMs) {
        this.revoked.delete(tokenId);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.revoked.size;
  }

  startCleanup(intervalMs = 5 * 60 * 1000): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => this.sweep(Date.now()), intervalMs);
    this.cleanupTimer.unref();
  }

  stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }
}
