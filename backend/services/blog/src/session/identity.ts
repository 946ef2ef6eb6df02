// backend/services/blog/src/session/identity.ts
import type { Request } from "express";
import type { RequestIdentity } from "../../../shared/src/types/identity";
import type { BlogSession } from "./session";

/** The administrator is the user with primary key 1 (the first registered). */
export const ADMIN_USER_ID = 1;

export function isAdmin(identity: RequestIdentity | null | undefined): boolean {
  return identity != null && identity.id === ADMIN_USER_ID;
}

export function requireSession(req: Request): BlogSession {
  if (!req.session) {
    throw new Error("session middleware must run before this handler");
  }
  return req.session;
}

/** For handlers behind requireAdmin/requireAuth, where an identity is guaranteed. */
export function requireIdentity(req: Request): RequestIdentity {
  if (!req.identity) {
    throw new Error("an auth guard must run before this handler");
  }
  return req.identity;
}
