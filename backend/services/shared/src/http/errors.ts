// backend/services/shared/src/http/errors.ts

/**
 * Errors thrown (or passed to `next`) by handlers. The error tail in
 * middleware/errorPage.ts turns these into a rendered page with `statusCode`.
 */
export class HttpError extends Error {
  public readonly statusCode: number;
  public readonly title: string;

  constructor(statusCode: number, title: string, detail?: string) {
    super(detail ?? title);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.title = title;
  }
}

export const notFound = (detail = "The requested page could not be found.") =>
  new HttpError(404, "Not Found", detail);

export const badRequest = (detail: string) =>
  new HttpError(400, "Bad Request", detail);

/** Status carried by an arbitrary thrown value (body-parser, HttpError, ...). */
export function statusOf(err: unknown): number {
  if (err instanceof HttpError) return err.statusCode;
  if (typeof err === "object" && err !== null) {
    const raw =
      ("statusCode" in err ? err.statusCode : undefined) ??
      ("status" in err ? err.status : undefined);
    const n = Number(raw);
    if (Number.isInteger(n) && n >= 400 && n <= 599) return n;
  }
  return 500;
}
