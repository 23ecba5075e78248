import { describe, expect, test } from "vitest";
import {
  SESSION_COOKIE,
  type TestApp,
  buildApp,
  parseJson,
  postJson,
  testConfig,
} from "../../helpers/app";

type ErrorBody = {
  error: {
    code: string;
    message: string;
    details?: { field: string; message: string; code: string }[];
  };
};
type LoginBody = {
  type: string;
  token: string;
  expiresAt: string;
  username: string;
};

const alice = {
  username: "alice",
  password: "Str0ngP@ss",
  securityQuestionId: "Q_PET",
  securityAnswer: "Rex",
};

const signupAlice = async (app: TestApp) => {
  const response = await postJson(app, "/auth/signup", alice);
  expect(response.status).toBe(201);
};

const login = async (app: TestApp, password = alice.password) => {
  const response = await postJson(app, "/auth/login", {
    username: alice.username,
    password,
  });
  return { response, body: await parseJson<LoginBody & ErrorBody>(response) };
};

describe("Auth routes", () => {
  test("signup, login, validate, reset and log in again", async () => {
    const app = buildApp();

    const signup = await postJson(app, "/auth/signup", alice);
    expect(signup.status).toBe(201);
    const signupBody = await parseJson<{
      ok: boolean;
      account: { username: string; securityQuestionId: string };
    }>(signup);
    expect(signupBody.ok).toBe(true);
    expect(signupBody.account.username).toBe("alice");
    expect(signupBody.account.securityQuestionId).toBe("Q_PET");

    const first = await login(app);
    expect(first.response.status).toBe(200);
    expect(first.body.type).toBe("bearer");
    expect(first.body.username).toBe("alice");

    const validate = await postJson(app, "/auth/session/validate", {
      token: first.body.token,
    });
    expect(validate.status).toBe(200);
    expect(await validate.json()).toEqual({ username: "alice" });

    const reset = await postJson(app, "/auth/reset-password", {
      username: "alice",
      securityAnswer: " rex ",
      newPassword: "N3wPassw0rd!",
    });
    expect(reset.status).toBe(200);
    expect(await reset.json()).toEqual({ ok: true });

    const oldPassword = await login(app);
    expect(oldPassword.response.status).toBe(401);
    expect(oldPassword.body).toEqual({
      error: { code: "INVALID_CREDENTIALS", message: "Invalid credentials" },
    });

    const newPassword = await login(app, "N3wPassw0rd!");
    expect(newPassword.response.status).toBe(200);
  });

  test("POST /auth/login sets an httpOnly session cookie", async () => {
    const app = buildApp();
    await signupAlice(app);

    const { response, body } = await login(app);

    const cookie = response.headers.get("set-cookie") ?? "";
    expect(cookie.startsWith(`${SESSION_COOKIE}=${body.token};`)).toBe(true);
    expect(cookie).toContain("HttpOnly");
    expect(cookie).toContain("SameSite=Lax");
  });

  test("POST /auth/login answers unknown users and wrong passwords alike", async () => {
    const app = buildApp();
    await signupAlice(app);

    const wrongPassword = await postJson(app, "/auth/login", {
      username: "alice",
      password: "Wr0ngPassword",
    });
    const unknownUser = await postJson(app, "/auth/login", {
      username: "mallory",
      password: "Str0ngP@ss",
    });

    expect(wrongPassword.status).toBe(401);
    expect(unknownUser.status).toBe(401);
    expect(await wrongPassword.json()).toEqual(await unknownUser.json());
  });

  test("POST /auth/signup reports policy failures with their codes", async () => {
    const app = buildApp();
    await signupAlice(app);

    const duplicate = await postJson(app, "/auth/signup", {
      ...alice,
      username: "ALICE",
    });
    expect(duplicate.status).toBe(409);
    expect(await duplicate.json()).toEqual({
      error: {
        code: "DUPLICATE_USERNAME",
        message: "Username is already taken",
      },
    });

    const weak = await postJson(app, "/auth/signup", {
      ...alice,
      username: "bob",
      password: "password1",
    });
    expect(weak.status).toBe(400);
    expect(await weak.json()).toEqual({
      error: {
        code: "WEAK_PASSWORD",
        message: "Password must contain an uppercase letter",
      },
    });

    const badName = await postJson(app, "/auth/signup", {
      ...alice,
      username: "bo",
    });
    expect(badName.status).toBe(400);
    expect(await badName.json()).toEqual({
      error: {
        code: "INVALID_USERNAME",
        message: "Username must be at least 3 characters",
      },
    });
  });

  test("POST /auth/signup rejects malformed bodies", async () => {
    const app = buildApp();

    const response = await postJson(app, "/auth/signup", {
      username: "carol",
      password: "Str0ngP@ss",
      securityQuestionId: "Q_COLOR",
    });

    expect(response.status).toBe(422);
    const body = await parseJson<ErrorBody>(response);
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.message).toBe("Invalid request");
    expect(body.error.details?.map((d) => d.field).sort()).toEqual([
      "securityAnswer",
      "securityQuestionId",
    ]);
  });

  test("POST /auth/reset-password rejects a wrong answer and keeps the password", async () => {
    const app = buildApp();
    await signupAlice(app);

    const reset = await postJson(app, "/auth/reset-password", {
      username: "alice",
      securityAnswer: "Max",
      newPassword: "N3wPassw0rd!",
    });

    expect(reset.status).toBe(401);
    expect((await parseJson<ErrorBody>(reset)).error.code).toBe(
      "INVALID_CREDENTIALS",
    );
    expect((await login(app)).response.status).toBe(200);
  });

  test("POST /auth/reset-password compares long answers in full", async () => {
    const app = buildApp();
    const prefix = "my first pet was a very patient tabby cat named after ".repeat(2);
    const signup = await postJson(app, "/auth/signup", {
      ...alice,
      securityAnswer: `${prefix} Rex`,
    });
    expect(signup.status).toBe(201);

    const reset = await postJson(app, "/auth/reset-password", {
      username: "alice",
      securityAnswer: `${prefix} WRONG`,
      newPassword: "N3wPassw0rd!",
    });

    expect(reset.status).toBe(401);
    expect((await login(app)).response.status).toBe(200);
  });

  test("POST /auth/reset-password rejects a weak new password", async () => {
    const app = buildApp();
    await signupAlice(app);

    const reset = await postJson(app, "/auth/reset-password", {
      username: "alice",
      securityAnswer: "rex",
      newPassword: "weakpass",
    });

    expect(reset.status).toBe(400);
    expect(await reset.json()).toEqual({
      error: {
        code: "WEAK_PASSWORD",
        message: "Password must contain an uppercase letter",
      },
    });
  });

  test("POST /auth/session/validate rejects tampered tokens", async () => {
    const app = buildApp();
    await signupAlice(app);
    const { body } = await login(app);

    const response = await postJson(app, "/auth/session/validate", {
      token: `${body.token}x`,
    });

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({
      error: { code: "UNAUTHORIZED", message: "Unauthorized" },
    });
  });

  test("POST /auth/logout revokes the bearer token", async () => {
    const app = buildApp();
    await signupAlice(app);
    const { body } = await login(app);

    const logout = await postJson(
      app,
      "/auth/logout",
      {},
      { authorization: `Bearer ${body.token}` },
    );
    expect(logout.status).toBe(200);
    expect(await logout.json()).toEqual({ ok: true, mode: "revoked" });

    const validate = await postJson(app, "/auth/session/validate", {
      token: body.token,
    });
    expect(validate.status).toBe(401);
  });

  test("POST /auth/logout without revocation leaves the token to the client", async () => {
    const app = buildApp({ logoutRevocation: false });
    await signupAlice(app);
    const { body } = await login(app);

    const logout = await postJson(app, "/auth/logout", { token: body.token });
    expect(await logout.json()).toEqual({ ok: true, mode: "client_discard" });

    const validate = await postJson(app, "/auth/session/validate", {
      token: body.token,
    });
    expect(validate.status).toBe(200);
  });

  test("GET /auth/me accepts the bearer header or the session cookie", async () => {
    const app = buildApp();
    await signupAlice(app);
    const { body } = await login(app);

    const viaBearer = await app.request("/auth/me", {
      headers: { authorization: `Bearer ${body.token}` },
    });
    const viaCookie = await app.request("/auth/me", {
      headers: { cookie: `${SESSION_COOKIE}=${body.token}` },
    });

    expect(viaBearer.status).toBe(200);
    expect(viaCookie.status).toBe(200);
    const account = await parseJson<{
      username: string;
      securityQuestionId: string;
    }>(viaBearer);
    expect(account.username).toBe("alice");
    expect(account.securityQuestionId).toBe("Q_PET");
  });

  test("GET /auth/me returns 401 without a token", async () => {
    const app = buildApp();

    const response = await app.request("/auth/me");

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({
      error: { code: "UNAUTHORIZED", message: "Unauthorized" },
    });
  });

  test("GET /auth/security-questions lists the signup choices", async () => {
    const app = buildApp();

    const response = await app.request("/auth/security-questions");
    const body = await parseJson<{ questions: { id: string }[] }>(response);

    expect(body.questions.map((q) => q.id)).toEqual([
      "Q_PET",
      "Q_MOTHER_MAIDEN_NAME",
      "Q_FIRST_CAR",
      "Q_BIRTH_CITY",
    ]);
  });

  test("GET /auth/security-question returns the account's question", async () => {
    const app = buildApp();
    await signupAlice(app);

    const known = await app.request("/auth/security-question?username=alice");
    expect(await known.json()).toEqual({
      questionId: "Q_PET",
      prompt: "What is your pet's name?",
    });

    const unknown = await app.request("/auth/security-question?username=ghost");
    expect(unknown.status).toBe(200);

    const missing = await app.request("/auth/security-question");
    expect(missing.status).toBe(422);
    const missingBody = await parseJson<ErrorBody>(missing);
    expect(missingBody.error.message).toBe("Invalid query parameters");
  });
});

describe("Auth throttling", () => {
  test("locks login out after repeated failures", async () => {
    const app = buildApp({
      rateLimits: { ...testConfig.rateLimits, loginLockoutThreshold: 3 },
    });
    await signupAlice(app);

    for (let attempt = 0; attempt < 3; attempt += 1) {
      expect((await login(app, "Wr0ngPassword")).response.status).toBe(401);
    }
    const locked = await login(app);

    expect(locked.response.status).toBe(429);
    expect(locked.body.error.code).toBe("TOO_MANY_REQUESTS");
  });

  test("caps password reset attempts per username", async () => {
    const app = buildApp({
      rateLimits: { ...testConfig.rateLimits, resetMaxAttempts: 2 },
    });
    await signupAlice(app);
    const attempt = () =>
      postJson(app, "/auth/reset-password", {
        username: "Alice",
        securityAnswer: "wrong",
        newPassword: "N3wPassw0rd!",
      });

    expect((await attempt()).status).toBe(401);
    expect((await attempt()).status).toBe(401);
    const throttled = await attempt();

    expect(throttled.status).toBe(429);
    expect(await throttled.json()).toEqual({
      error: {
        code: "TOO_MANY_REQUESTS",
        message: "Too many password reset attempts. Try again later.",
      },
    });
  });
});
