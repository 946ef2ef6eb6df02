// backend/services/blog/src/services/adminSeeder.ts
import type { BlogDeps } from "../deps";
import { ADMIN_USER_ID } from "../session/identity";

export interface AdminSeed {
  email: string;
  password: string;
  name: string;
}

export type SeedResult =
  | { created: true; userId: number }
  | { created: false; reason: "users-exist" };

/**
 * Creates the administrator on an empty store. The admin is whoever holds
 * id 1, so this only runs before anyone has registered.
 */
export async function seedAdmin(
  deps: Pick<BlogDeps, "users" | "passwords">,
  seed: AdminSeed
): Promise<SeedResult> {
  if (deps.users.count() > 0) return { created: false, reason: "users-exist" };

  const user = deps.users.create({
    email: seed.email.trim(),
    name: seed.name.trim(),
    password: await deps.passwords.hash(seed.password),
  });
  if (user.id !== ADMIN_USER_ID) {
    throw new Error(`seeded admin got id ${user.id}, expected ${ADMIN_USER_ID}`);
  }
  return { created: true, userId: user.id };
}
