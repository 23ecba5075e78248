import { describe, expect, test } from "vitest";
import { DummyCredential } from "#/application/use-cases/auth";
import { InMemoryAccountRepository } from "#/infrastructure/accounts/in-memory-account.repo";
import { AccountDbRepository } from "#/infrastructure/db/repositories/account.repo";
import { createHttpContainer } from "#/interfaces/http/container";
import { testConfig } from "../../helpers/app";

describe("createHttpContainer", () => {
  test("wires the in-memory store and a revoking token service", () => {
    const container = createHttpContainer(testConfig);

    expect(container.auth.accountRepository).toBeInstanceOf(
      InMemoryAccountRepository,
    );
    expect(container.auth.tokenService.supportsRevocation).toBe(true);
    expect(container.background.revocationStore).not.toBeNull();
    expect(container.background.revocationSweepMs).toBe(300_000);
    expect(container.auth.sessionCookieName).toBe("test_session");
    expect(container.auth.dummyCredential).toBeInstanceOf(DummyCredential);
  });

  test("uses the database store and stateless tokens when configured", () => {
    const container = createHttpContainer({
      ...testConfig,
      credentialStore: "mysql",
      logoutRevocation: false,
    });

    expect(container.auth.accountRepository).toBeInstanceOf(
      AccountDbRepository,
    );
    expect(container.auth.tokenService.supportsRevocation).toBe(false);
    expect(container.background.revocationStore).toBeNull();
  });
});
