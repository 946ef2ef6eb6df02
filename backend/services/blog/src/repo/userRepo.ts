// backend/services/blog/src/repo/userRepo.ts
import { count, eq } from "drizzle-orm";
import { users, type NewUser, type User } from "../models/schema";
import type { BlogDb } from "../db";
import { RepoBase } from "./RepoBase";

export class UserRepo extends RepoBase {
  constructor(db: BlogDb) {
    super(db, "users");
  }

  findById(id: number): User | undefined {
    return this.db.select().from(users).where(eq(users.id, id)).get();
  }

  findByEmail(email: string): User | undefined {
    return this.db.select().from(users).where(eq(users.email, email)).get();
  }

  create(doc: NewUser): User {
    const created = this.db.insert(users).values(doc).returning().get();
    if (!created) throw new Error("insert into users returned no row");
    this.log.debug({ userId: created.id }, "user inserted");
    return created;
  }

  count(): number {
    return this.db.select({ n: count() }).from(users).get()?.n ?? 0;
  }
}
