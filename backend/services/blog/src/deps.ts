// backend/services/blog/src/deps.ts
import type { BlogConfig } from "./config";
import type { BlogStore } from "./db";
import { UserRepo } from "./repo/userRepo";
import { PostRepo } from "./repo/postRepo";
import { CommentRepo } from "./repo/commentRepo";
import { PasswordHasher } from "./lib/password";
import { SessionCodec } from "./session/session";

/** Everything a handler may touch. Built once per process (or per test). */
export interface BlogDeps {
  config: BlogConfig;
  store: BlogStore;
  users: UserRepo;
  posts: PostRepo;
  comments: CommentRepo;
  passwords: PasswordHasher;
  sessions: SessionCodec;
  /** Source of "now" for post dates. */
  clock: () => Date;
}

export function createDeps(
  config: BlogConfig,
  store: BlogStore,
  overrides: Partial<Pick<BlogDeps, "clock">> = {}
): BlogDeps {
  return {
    config,
    store,
    users: new UserRepo(store.db),
    posts: new PostRepo(store.db),
    comments: new CommentRepo(store.db),
    passwords: new PasswordHasher(config.bcryptRounds),
    sessions: new SessionCodec({
      secret: config.secretKey,
      maxAgeSec: config.sessionMaxAgeSec,
      secure: config.secureCookies,
    }),
    clock: overrides.clock ?? (() => new Date()),
  };
}
