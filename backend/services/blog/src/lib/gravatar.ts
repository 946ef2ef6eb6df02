// backend/services/blog/src/lib/gravatar.ts
import { createHash } from "node:crypto";

export interface GravatarOptions {
  size?: number;
  rating?: "g" | "pg" | "r" | "x";
  fallback?: string;
}

const BASE_URL = "http://www.gravatar.com/avatar/";

/** Avatar URL for a comment author (size 100, rating g, "retro" fallback). */
export function gravatarUrl(email: string, opts: GravatarOptions = {}): string {
  const { size = 100, rating = "g", fallback = "retro" } = opts;
  const digest = createHash("md5")
    .update(email.trim().toLowerCase())
    .digest("hex");
  return `${BASE_URL}${digest}?s=${size}&d=${encodeURIComponent(fallback)}&r=${rating}`;
}
