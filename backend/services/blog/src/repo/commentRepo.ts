// backend/services/blog/src/repo/commentRepo.ts
import { asc, count, eq } from "drizzle-orm";
import { comments, users, type Comment, type NewComment } from "../models/schema";
import type { BlogDb } from "../db";
import { RepoBase } from "./RepoBase";

export type CommentWithAuthor = Comment & {
  authorName: string;
  authorEmail: string;
};

export class CommentRepo extends RepoBase {
  constructor(db: BlogDb) {
    super(db, "comments");
  }

  listForPost(postId: number): CommentWithAuthor[] {
    return this.db
      .select({
        id: comments.id,
        text: comments.text,
        authorId: comments.authorId,
        postId: comments.postId,
        authorName: users.name,
        authorEmail: users.email,
      })
      .from(comments)
      .innerJoin(users, eq(comments.authorId, users.id))
      .where(eq(comments.postId, postId))
      .orderBy(asc(comments.id))
      .all();
  }

  create(doc: NewComment): Comment {
    const created = this.db.insert(comments).values(doc).returning().get();
    if (!created) throw new Error("insert into comments returned no row");
    this.log.debug(
      { commentId: created.id, postId: created.postId },
      "comment inserted"
    );
    return created;
  }

  countForPost(postId: number): number {
    return (
      this.db
        .select({ n: count() })
        .from(comments)
        .where(eq(comments.postId, postId))
        .get()?.n ?? 0
    );
  }
}
