// backend/services/blog/src/app.ts
import path from "node:path";
import type { Express } from "express";
import { createServiceApp } from "../../shared/src/app/createServiceApp";
import type { BlogDeps } from "./deps";
import { sessionMiddleware } from "./session/middleware";
import { mountBlogRoutes } from "./routes/blogRoutes";
import { errorPageContext } from "./http/respond";
import { errorView } from "./views/errorView";

/** Express app for the blog. No listening here; see index.ts. */
export function createBlogApp(deps: BlogDeps): Express {
  return createServiceApp({
    serviceName: deps.config.serviceName,
    staticDir: path.resolve(__dirname, "..", "public"),
    readiness: () => {
      deps.store.ping();
      return { db: "ok" };
    },
    middleware: [sessionMiddleware(deps.sessions, deps.users)],
    mountRoutes: (router) => mountBlogRoutes(router, deps),
    renderError: (info, req) => errorView(errorPageContext(req), info).toString(),
    trustProxy: deps.config.secureCookies,
  });
}
