import { type PasswordHasher } from "#/application/ports/auth";

const DUMMY_SECRET = "sentinel-dummy-secret";

/**
 * Stand-in credential verified when an account does not exist, so unknown
 * usernames cost one full hash verification like known ones.
 */
export class DummyCredential {
  private material: Promise<{ salt: string; digest: string }> | null = null;

  constructor(private readonly passwordHasher: PasswordHasher) {}

  /** Builds the stand-in digest ahead of the first unknown-username request. */
  async prepare(): Promise<void> {
    await this.load();
  }

  async verify(secret: string): Promise<false> {
    const { salt, digest } = await this.load();
    await this.passwordHasher.verify({ secret, salt, digest });
    return false;
  }

  private load(): Promise<{ salt: string; digest: string }> {
    if (!this.material) {
      const hasher = this.passwordHasher;
      this.material = (async () => {
        const salt = await hasher.generateSalt();
        return { salt, digest: await hasher.hash(DUMMY_SECRET, salt) };
      })();
    }
    return this.material;
  }
}
