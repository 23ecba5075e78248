import { createHash, timingSafeEqual } from "node:crypto";
import bcrypt from "bcryptjs";
import { type PasswordHasher } from "#/application/ports/auth";

const DEFAULT_ROUNDS = 10;

// bcrypt reads only the first 72 bytes; a SHA-256 digest in base64 is 44.
const prehash = (secret: string): string =>
  createHash("sha256").update(secret, "utf8").digest("base64");

const constantTimeEquals = (a: string, b: string): boolean => {
  const left = Buffer.from(a, "utf8");
  const right = Buffer.from(b, "utf8");
  if (left.length !== right.length) {
    // Keep the comparison cost when lengths differ.
    timingSafeEqual(left, left);
    return false;
  }
  return timingSafeEqual(left, right);
};

export class BcryptPasswordHasher implements PasswordHasher {
  constructor(private readonly deps: { rounds?: number } = {}) {}

  generateSalt(): Promise<string> {
    return bcrypt.genSalt(this.deps.rounds ?? DEFAULT_ROUNDS);
  }

  hash(secret: string, salt: string): Promise<string> {
    return bcrypt.hash(prehash(secret), salt);
  }

  async verify(input: {
    secret: string;
    salt: string;
    digest: string;
  }): Promise<boolean> {
    let recomputed: string;
    try {
      recomputed = await bcrypt.hash(prehash(input.secret), input.salt);
    } catch {
      // A corrupt salt can never match; treat it like a wrong secret.
      return false;
    }
    return constantTimeEquals(recomputed, input.digest);
  }
}
