import { randomUUID } from "node:crypto";
import * as jose from "jose";
import {
  type Clock,
  type IssuedSessionToken,
  type TokenFailureStatus,
  type TokenRevocationStore,
  type TokenService,
  type TokenVerification,
} from "#/application/ports/auth";
import { sessionClaimsSchema } from "#/infrastructure/auth/session-claims.schema";

const ALGORITHM = "HS256";

/** Process-wide signing material, fixed at startup. */
export interface SigningKey {
  readonly secret: Uint8Array;
  readonly issuer: string;
}

export const createSigningKey = (input: {
  secret: string;
  issuer: string;
}): SigningKey =>
  Object.freeze({
    secret: new TextEncoder().encode(input.secret),
    issuer: input.issuer,
  });

interface JwtTokenServiceDeps {
  signingKey: SigningKey;
  clock: Clock;
  tokenTtlSeconds: number;
  revocationStore?: TokenRevocationStore;
}

const classifyVerifyError = (error: unknown): TokenFailureStatus => {
  if (error instanceof jose.errors.JWTExpired) {
    return "expired";
  }
  if (
    error instanceof jose.errors.JWSSignatureVerificationFailed ||
    error instanceof jose.errors.JOSEAlgNotAllowed
  ) {
    return "invalid_signature";
  }
  return "malformed";
};

/**
 * Checks a token against the key at `nowSeconds` without touching any state.
 * jose verifies the signature before it reads a single claim.
 */
export const verifySessionToken = async (
  token: string,
  signingKey: SigningKey,
  nowSeconds: number,
): Promise<TokenVerification> => {
  let payload: jose.JWTPayload;
  try {
    ({ payload } = await jose.jwtVerify(token, signingKey.secret, {
      algorithms: [ALGORITHM],
      issuer: signingKey.issuer,
      currentDate: new Date(nowSeconds * 1000),
      requiredClaims: ["sub", "iat", "exp", "jti"],
    }));
  } catch (error) {
    return { status: classifyVerifyError(error) };
  }

  const parsed = sessionClaimsSchema.safeParse(payload);
  if (!parsed.success) {
    return { status: "malformed" };
  }

  return {
    status: "valid",
    claims: {
      subject: parsed.data.sub,
      tokenId: parsed.data.jti,
      issuedAt: parsed.data.iat,
      expiresAt: parsed.data.exp,
    },
  };
};

export class JwtTokenService implements TokenService {
  constructor(private readonly deps: JwtTokenServiceDeps) {}

  get supportsRevocation(): boolean {
    return this.deps.revocationStore !== undefined;
  }

  async issue(subject: string): Promise<IssuedSessionToken> {
    const issuedAt = this.deps.clock.nowSeconds();
    const expiresAt = issuedAt + this.deps.tokenTtlSeconds;
    const tokenId = randomUUID();

    const token = await new jose.SignJWT({})
      .setProtectedHeader({ alg: ALGORITHM, typ: "JWT" })
      .setSubject(subject)
      .setIssuer(this.deps.signingKey.issuer)
      .setIssuedAt(issuedAt)
      .setExpirationTime(expiresAt)
      .setJti(tokenId)
      .sign(this.deps.signingKey.secret);

    return { token, subject, tokenId, issuedAt, expiresAt };
  }

  async verify(token: string): Promise<TokenVerification> {
    const nowSeconds = this.deps.clock.nowSeconds();
    const result = await verifySessionToken(
      token,
      this.deps.signingKey,
      nowSeconds,
    );
    if (
      result.status === "valid" &&
      this.deps.revocationStore?.isRevoked(
        result.claims.tokenId,
        nowSeconds * 1000,
      )
    ) {
      return { status: "revoked" };
    }
    return result;
  }

  async revoke(token: string): Promise<boolean> {
    const store = this.deps.revocationStore;
    if (!store) {
      return false;
    }
    const result = await this.verify(token);
    if (result.status !== "valid") {
      return false;
    }
    store.revoke(result.claims.tokenId, result.claims.expiresAt * 1000);
    return true;
  }
}
