import {
  type HttpContainerConfig,
  createHttpContainer,
} from "#/interfaces/http/container";
import { createHttpApp } from "#/interfaces/http";
import { testPolicy } from "./policy";

export const SESSION_COOKIE = "test_session";

export const testConfig: HttpContainerConfig = {
  credentialStore: "memory",
  jwtSecret: "test-secret-for-session-tokens",
  jwtIssuer: "sentinel",
  tokenTtlSeconds: 3600,
  bcryptRounds: 4,
  logoutRevocation: true,
  revocationSweepSeconds: 300,
  sessionCookieName: SESSION_COOKIE,
  policy: testPolicy,
  rateLimits: {
    loginMaxAttempts: 50,
    loginWindowSeconds: 60,
    loginLockoutThreshold: 20,
    loginLockoutSeconds: 300,
    resetMaxAttempts: 20,
    resetWindowSeconds: 900,
  },
};

export const buildApp = (overrides: Partial<HttpContainerConfig> = {}) =>
  createHttpApp(createHttpContainer({ ...testConfig, ...overrides }));

export type TestApp = ReturnType<typeof buildApp>;

export const parseJson = async <T>(response: Response) =>
  (await response.json()) as T;

export const postJson = (
  app: TestApp,
  path: string,
  body: unknown,
  headers: Record<string, string> = {},
) =>
  app.request(path, {
    method: "POST",
    headers: { "content-type": "application/json", ...headers },
    body: JSON.stringify(body),
  });
