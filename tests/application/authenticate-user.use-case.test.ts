import { describe, expect, test } from "vitest";
import {
  AuthenticateUserUseCase,
  DummyCredential,
  InvalidCredentialsError,
} from "#/application/use-cases/auth";
import { InMemoryAccountRepository } from "#/infrastructure/accounts/in-memory-account.repo";
import {
  FakePasswordHasher,
  FakeTokenService,
  RecordingDiagnostics,
} from "../helpers/fakes";

const makeDeps = async () => {
  const accountRepository = new InMemoryAccountRepository();
  await accountRepository.create({
    username: "Alice",
    passwordHash: "salt-a:Str0ngP@ss",
    passwordSalt: "salt-a",
    securityQuestionId: "Q_PET",
    securityAnswerHash: "salt-b:rex",
    securityAnswerSalt: "salt-b",
    createdAt: new Date(0),
  });
  const passwordHasher = new FakePasswordHasher();
  const diagnostics = new RecordingDiagnostics();
  const useCase = new AuthenticateUserUseCase({
    accountRepository,
    passwordHasher,
    dummyCredential: new DummyCredential(passwordHasher),
    tokenService: new FakeTokenService(),
    diagnostics,
  });
  return { useCase, passwordHasher, diagnostics };
};

describe("AuthenticateUserUseCase", () => {
  test("issues a bearer token for the stored username", async () => {
    const { useCase } = await makeDeps();

    const result = await useCase.execute({
      username: "alice",
      password: "Str0ngP@ss",
    });

    expect(result).toEqual({
      type: "bearer",
      token: "token:Alice",
      expiresAt: "2023-11-14T23:13:20.000Z",
      username: "Alice",
    });
  });

  test("fails the same way for a wrong password and an unknown user", async () => {
    const { useCase, diagnostics } = await makeDeps();

    const wrongPassword = await useCase
      .execute({ username: "alice", password: "Wr0ngPass" })
      .catch((error: unknown) => error);
    const unknownUser = await useCase
      .execute({ username: "mallory", password: "Str0ngP@ss" })
      .catch((error: unknown) => error);

    expect(wrongPassword).toBeInstanceOf(InvalidCredentialsError);
    expect(unknownUser).toBeInstanceOf(InvalidCredentialsError);
    expect(wrongPassword).toEqual(unknownUser);
    expect(diagnostics.credentialFailures).toEqual([
      { operation: "login", username: "alice", reason: "wrong_secret" },
      { operation: "login", username: "mallory", reason: "unknown_account" },
    ]);
  });

  test("runs one hash verification whether or not the account exists", async () => {
    const { useCase, passwordHasher } = await makeDeps();

    await useCase
      .execute({ username: "alice", password: "Wr0ngPass" })
      .catch(() => undefined);
    const afterKnown = passwordHasher.verifyCalls;
    await useCase
      .execute({ username: "nobody", password: "Wr0ngPass" })
      .catch(() => undefined);

    expect(afterKnown).toBe(1);
    expect(passwordHasher.verifyCalls - afterKnown).toBe(1);
  });

  test("a prepared dummy credential costs unknown usernames one verify only", async () => {
    const passwordHasher = new FakePasswordHasher();
    const dummyCredential = new DummyCredential(passwordHasher);
    await dummyCredential.prepare();
    expect(passwordHasher.saltCount).toBe(1);

    const useCase = new AuthenticateUserUseCase({
      accountRepository: new InMemoryAccountRepository(),
      passwordHasher,
      dummyCredential,
      tokenService: new FakeTokenService(),
      diagnostics: new RecordingDiagnostics(),
    });

    await expect(
      useCase.execute({ username: "ghost", password: "Str0ngP@ss" }),
    ).rejects.toBeInstanceOf(InvalidCredentialsError);
    expect(passwordHasher.saltCount).toBe(1);
    expect(passwordHasher.verifyCalls).toBe(1);
  });
});
