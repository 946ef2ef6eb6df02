// backend/services/blog/src/lib/password.ts
import bcrypt from "bcrypt";

/**
 * Salted, iterative password hashing (bcrypt). The salt (16 bytes) and cost
 * are encoded in the hash, so verify needs only the stored string.
 * Never log the cleartext.
 */
export class PasswordHasher {
  constructor(private readonly rounds: number) {}

  hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.rounds);
  }

  verify(password: string, storedHash: string): Promise<boolean> {
    return bcrypt.compare(password, storedHash);
  }
}
