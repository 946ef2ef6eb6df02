// backend/services/blog/src/http/respond.ts
import type { Request, Response } from "express";
import type { SafeHtml } from "../../../shared/src/view/html";
import { isAdmin, requireSession } from "../session/identity";
import type { PageContext } from "../views/layout";

/** Per-request data every page needs. Consumes pending flashes. */
export function pageContext(req: Request): PageContext {
  const session = requireSession(req);
  return {
    identity: req.identity ?? null,
    isAdmin: isAdmin(req.identity),
    flashes: session.consumeFlashes(),
    csrfToken: session.csrfToken,
  };
}

/** Context for the error tail, which may run before the session exists. */
export function errorPageContext(req: Request): PageContext {
  return {
    identity: req.identity ?? null,
    isAdmin: isAdmin(req.identity),
    flashes: [],
    csrfToken: req.session?.csrfToken ?? "",
  };
}

export function renderPage(
  req: Request,
  res: Response,
  view: (page: PageContext) => SafeHtml,
  status = 200
): void {
  const body = view(pageContext(req)).toString();
  requireSession(req).commit(res);
  res.status(status).type("html").send(body);
}

export function redirectTo(
  req: Request,
  res: Response,
  location: string,
  status = 302
): void {
  req.session?.commit(res);
  res.redirect(status, location);
}
