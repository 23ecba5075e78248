import { describe, expect, test } from "vitest";
import {
  checkPasswordStrength,
  checkUsername,
  normalizeUsername,
  toUsernameKey,
} from "#/domain/accounts/account";
import { testPolicy } from "../helpers/policy";

describe("username rules", () => {
  test("keeps the typed case but keys on lower case", () => {
    expect(normalizeUsername("  Alice ")).toBe("Alice");
    expect(toUsernameKey("  Alice ")).toBe("alice");
  });

  test("accepts a well-formed username", () => {
    expect(checkUsername("alice.smith_2", testPolicy.username)).toBeNull();
  });

  test("rejects empty, short, long and badly formed usernames", () => {
    expect(checkUsername("   ", testPolicy.username)).toBe(
      "Username is required",
    );
    expect(checkUsername("al", testPolicy.username)).toBe(
      "Username must be at least 3 characters",
    );
    expect(checkUsername("a".repeat(33), testPolicy.username)).toBe(
      "Username must be at most 32 characters",
    );
    expect(checkUsername("-alice", testPolicy.username)).toBe(
      "Username may contain only letters, digits, '.', '_' and '-', and must start with a letter or digit",
    );
    expect(checkUsername("al ice", testPolicy.username)).not.toBeNull();
  });
});

describe("checkPasswordStrength", () => {
  test("returns no problems for a strong password", () => {
    expect(
      checkPasswordStrength("Str0ngP@ss", testPolicy.password, {
        username: "alice",
      }),
    ).toEqual([]);
  });

  test("lists every unmet rule in order", () => {
    expect(checkPasswordStrength("short", testPolicy.password)).toEqual([
      "Password must be at least 8 characters",
      "Password must contain an uppercase letter",
      "Password must contain a digit",
    ]);
  });

  test("enforces a symbol only when the policy asks for one", () => {
    expect(
      checkPasswordStrength("Abcdefg1", {
        ...testPolicy.password,
        requireSymbol: true,
      }),
    ).toEqual(["Password must contain a symbol"]);
    expect(checkPasswordStrength("Abcdefg1", testPolicy.password)).toEqual([]);
  });

  test("rejects passwords longer than 72 bytes", () => {
    const password = `Aa1${"é".repeat(35)}`;
    expect(checkPasswordStrength(password, testPolicy.password)).toEqual([
      "Password must be at most 72 bytes",
    ]);
  });

  test("rejects a password equal to the username", () => {
    expect(
      checkPasswordStrength("Alice123", testPolicy.password, {
        username: "ALICE123",
      }),
    ).toEqual(["Password must not match the username"]);
  });
});
