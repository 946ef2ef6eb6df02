// backend/services/blog/src/session/middleware.ts
import type { RequestHandler } from "express";
import type { UserRepo } from "../repo/userRepo";
import { BlogSession, SESSION_COOKIE, type SessionCodec } from "./session";

/**
 * Resolves the session cookie and the identity bound to it, once per request.
 * The identity travels on `req.identity`; nothing is cached across requests.
 */
export function sessionMiddleware(
  codec: SessionCodec,
  users: UserRepo
): RequestHandler {
  return (req, _res, next) => {
    const token: unknown = req.cookies?.[SESSION_COOKIE];
    const session = new BlogSession(codec, codec.decode(token));
    req.session = session;
    req.identity = null;

    const uid = session.userId;
    if (uid !== undefined) {
      const user = users.findById(uid);
      if (user) {
        req.identity = { id: user.id, email: user.email, name: user.name };
      } else {
        // Bound user no longer exists: fall back to anonymous.
        session.logout();
        req.log.debug({ uid }, "session user not found");
      }
    }

    next();
  };
}
