interface AttemptState {
  firstAttemptAtMs: number;
  windowMs: number;
  attemptCount: number;
  lockedUntilMs?: number;
}

const startWindow = (
  current: AttemptState | undefined,
  nowMs: number,
  windowMs: number,
): AttemptState =>
  !current || nowMs - current.firstAttemptAtMs > windowMs
    ? { firstAttemptAtMs: nowMs, windowMs, attemptCount: 0 }
    : current;

const windowEnded = (state: AttemptState, nowMs: number): boolean =>
  nowMs - state.firstAttemptAtMs > state.windowMs;

export class InMemoryAuthSecurityStore {
  private readonly loginAttempts = new Map<string, AttemptState>();
  private readonly endpointAttempts = new Map<string, AttemptState>();
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;

  /** Start periodic sweep of expired entries (default: every 5 minutes). */
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

  /** Remove entries whose own window has ended and that are past any lockout. */
  sweep(nowMs: number): number {
    let removed = 0;
    for (const [key, state] of this.loginAttempts) {
      const pastLockout = !state.lockedUntilMs || state.lockedUntilMs <= nowMs;
      if (windowEnded(state, nowMs) && pastLockout) {
        this.loginAttempts.delete(key);
        removed += 1;
      }
    }
    for (const [key, state] of this.endpointAttempts) {
      if (windowEnded(state, nowMs)) {
        this.endpointAttempts.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  checkLoginAllowed(
    key: string,
    nowMs: number,
  ): {
    allowed: boolean;
    retryAfterSeconds?: number;
  } {
    const state = this.loginAttempts.get(key);
    if (!state?.lockedUntilMs || state.lockedUntilMs <= nowMs) {
      return { allowed: true };
    }
    return {
      allowed: false,
      retryAfterSeconds: Math.max(
        1,
        Math.ceil((state.lockedUntilMs - nowMs) / 1000),
      ),
    };
  }

  registerLoginFailure(input: {
    key: string;
    nowMs: number;
    windowSeconds: number;
    lockoutThreshold: number;
    lockoutSeconds: number;
  }): void {
    const current = startWindow(
      this.loginAttempts.get(input.key),
      input.nowMs,
      input.windowSeconds * 1000,
    );
    const attemptCount = current.attemptCount + 1;
    this.loginAttempts.set(input.key, {
      ...current,
      attemptCount,
      lockedUntilMs:
        attemptCount >= input.lockoutThreshold
          ? input.nowMs + input.lockoutSeconds * 1000
          : current.lockedUntilMs,
    });
  }

  clearLoginFailures(key: string): void {
    this.loginAttempts.delete(key);
  }

  consumeEndpointAttempt(input: {
    key: string;
    nowMs: number;
    windowSeconds: number;
    maxAttempts: number;
  }): boolean {
    const current = startWindow(
      this.endpointAttempts.get(input.key),
      input.nowMs,
      input.windowSeconds * 1000,
    );
    const attemptCount = current.attemptCount + 1;
    this.endpointAttempts.set(input.key, { ...current, attemptCount });
    return attemptCount <= input.maxAttempts;
  }
}
