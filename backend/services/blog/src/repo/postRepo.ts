// backend/services/blog/src/repo/postRepo.ts
import { asc, eq } from "drizzle-orm";
import { posts, users, type NewPost, type Post } from "../models/schema";
import type { BlogDb } from "../db";
import { RepoBase } from "./RepoBase";

/** A post row joined with its author's display name. */
export type PostWithAuthor = Post & { authorName: string };

/** The four fields an edit may change; author and date are fixed at creation. */
export type PostEdit = Pick<Post, "title" | "subtitle" | "imgUrl" | "body">;

const withAuthor = {
  id: posts.id,
  authorId: posts.authorId,
  title: posts.title,
  subtitle: posts.subtitle,
  date: posts.date,
  body: posts.body,
  imgUrl: posts.imgUrl,
  authorName: users.name,
};

export class PostRepo extends RepoBase {
  constructor(db: BlogDb) {
    super(db, "blog_posts");
  }

  /** All posts, oldest first. No paging. */
  list(): PostWithAuthor[] {
    return this.db
      .select(withAuthor)
      .from(posts)
      .innerJoin(users, eq(posts.authorId, users.id))
      .orderBy(asc(posts.id))
      .all();
  }

  findById(id: number): PostWithAuthor | undefined {
    return this.db
      .select(withAuthor)
      .from(posts)
      .innerJoin(users, eq(posts.authorId, users.id))
      .where(eq(posts.id, id))
      .get();
  }

  findByTitle(title: string): Post | undefined {
    return this.db.select().from(posts).where(eq(posts.title, title)).get();
  }

  create(doc: NewPost): Post {
    const created = this.db.insert(posts).values(doc).returning().get();
    if (!created) throw new Error("insert into blog_posts returned no row");
    this.log.debug({ postId: created.id }, "post inserted");
    return created;
  }

  /** Returns false when no row has that id. */
  updateById(id: number, edit: PostEdit): boolean {
    const res = this.db
      .update(posts)
      .set({
        title: edit.title,
        subtitle: edit.subtitle,
        imgUrl: edit.imgUrl,
        body: edit.body,
      })
      .where(eq(posts.id, id))
      .run();
    return res.changes > 0;
  }

  /**
   * Deletes the post; its comments go with it (ON DELETE CASCADE).
   * Returns false when there was nothing to delete.
   */
  deleteById(id: number): boolean {
    const res = this.db.delete(posts).where(eq(posts.id, id)).run();
    return res.changes > 0;
  }
}
