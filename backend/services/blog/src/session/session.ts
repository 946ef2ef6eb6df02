// backend/services/blog/src/session/session.ts
import jwt, { type JwtPayload } from "jsonwebtoken";
import { randomBytes } from "node:crypto";
import type { Response } from "express";
import { z } from "zod";
import { logger } from "../../../shared/src/utils/logger";

export const SESSION_COOKIE = "session";

const zSessionPayload = z.object({
  uid: z.number().int().positive().optional(),
  csrf: z.string().min(16),
  flashes: z.array(z.string()).default([]),
});

export type SessionData = z.infer<typeof zSessionPayload>;

export interface SessionCodecOptions {
  secret: string;
  maxAgeSec: number;
  secure: boolean;
}

/**
 * Cookie-backed session: the whole session is a signed JWT (HS256) in the
 * `session` cookie. A token that fails verification or shape checks is
 * treated as no session at all.
 */
export class SessionCodec {
  constructor(private readonly opts: SessionCodecOptions) {}

  decode(token: unknown): SessionData | null {
    if (typeof token !== "string" || token === "") return null;

    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.opts.secret, { algorithms: ["HS256"] });
    } catch (err) {
      logger.debug(
        { reason: err instanceof Error ? err.message : String(err) },
        "session cookie rejected"
      );
      return null;
    }

    const parsed = zSessionPayload.safeParse(decoded);
    return parsed.success ? parsed.data : null;
  }

  encode(data: SessionData): string {
    const payload: SessionData = { csrf: data.csrf, flashes: data.flashes };
    if (data.uid !== undefined) payload.uid = data.uid;
    return jwt.sign(payload, this.opts.secret, {
      algorithm: "HS256",
      expiresIn: this.opts.maxAgeSec,
    });
  }

  write(res: Response, data: SessionData): void {
    res.cookie(SESSION_COOKIE, this.encode(data), {
      httpOnly: true,
      sameSite: "lax",
      secure: this.opts.secure,
      maxAge: this.opts.maxAgeSec * 1000,
      path: "/",
    });
  }
}

export function newCsrfToken(): string {
  return randomBytes(32).toString("hex");
}

/** Per-request view of the session. Mutations mark it for re-issue on commit. */
export class BlogSession {
  private data: SessionData;
  private modified: boolean;

  constructor(private readonly codec: SessionCodec, data: SessionData | null) {
    if (data) {
      this.data = { ...data, flashes: [...data.flashes] };
      this.modified = false;
    } else {
      this.data = { csrf: newCsrfToken(), flashes: [] };
      this.modified = true;
    }
  }

  get userId(): number | undefined {
    return this.data.uid;
  }

  get csrfToken(): string {
    return this.data.csrf;
  }

  get isModified(): boolean {
    return this.modified;
  }

  login(userId: number): void {
    this.data.uid = userId;
    this.modified = true;
  }

  logout(): void {
    if (this.data.uid === undefined) return;
    delete this.data.uid;
    this.modified = true;
  }

  flash(message: string): void {
    this.data.flashes.push(message);
    this.modified = true;
  }

  /** Pending flashes, cleared from the session. */
  consumeFlashes(): string[] {
    if (this.data.flashes.length === 0) return [];
    const out = this.data.flashes;
    this.data.flashes = [];
    this.modified = true;
    return out;
  }

  commit(res: Response): void {
    if (!this.modified) return;
    this.codec.write(res, this.data);
    this.modified = false;
  }
}
