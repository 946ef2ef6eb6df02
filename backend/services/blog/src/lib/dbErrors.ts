// backend/services/blog/src/lib/dbErrors.ts

/**
 * True when `err` (or an error in its `cause` chain) is a SQLite UNIQUE
 * violation. Handlers check uniqueness first; this covers the race where two
 * requests pass the check together.
 */
export function isUniqueViolation(err: unknown): boolean {
  let cur: unknown = err;
  for (let depth = 0; depth < 5 && cur; depth++) {
    if (typeof cur !== "object" || cur === null) return false;
    const code = "code" in cur ? cur.code : undefined;
    if (code === "SQLITE_CONSTRAINT_UNIQUE") return true;
    const message = "message" in cur ? cur.message : undefined;
    if (
      typeof message === "string" &&
      /UNIQUE constraint failed/i.test(message)
    ) {
      return true;
    }
    cur = "cause" in cur ? cur.cause : undefined;
  }
  return false;
}
