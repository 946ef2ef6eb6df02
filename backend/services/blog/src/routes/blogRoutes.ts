// backend/services/blog/src/routes/blogRoutes.ts
import type { Router } from "express";
import type { BlogDeps } from "../deps";
import { requireAdmin, requireAuth } from "../middleware/guards";
import { csrfProtection } from "../middleware/csrf";

// Direct handler imports (no barrels)
import { list } from "../controllers/post/handlers/list";
import { show } from "../controllers/post/handlers/show";
import { comment } from "../controllers/post/handlers/comment";
import { newForm } from "../controllers/post/handlers/newForm";
import { create } from "../controllers/post/handlers/create";
import { editForm } from "../controllers/post/handlers/editForm";
import { update } from "../controllers/post/handlers/update";
import { remove } from "../controllers/post/handlers/remove";
import { registerForm } from "../controllers/auth/handlers/registerForm";
import { register } from "../controllers/auth/handlers/register";
import { loginForm } from "../controllers/auth/handlers/loginForm";
import { login } from "../controllers/auth/handlers/login";
import { logout } from "../controllers/auth/handlers/logout";
import { about } from "../controllers/pages/handlers/about";
import { contact } from "../controllers/pages/handlers/contact";

/**
 * Policy:
 * - Guards run first, so a non-admin is redirected before any CSRF check.
 * - Every form POST carries a CSRF token.
 * - Delete is a GET link on the home page (admin only).
 */
export function mountBlogRoutes(router: Router, deps: BlogDeps): void {
  const admin = requireAdmin();
  const auth = requireAuth();
  const csrf = csrfProtection(deps.config.csrfEnabled);

  // one-liners only — no logic here
  router.get("/", list(deps));
  router.get("/post/:id(\\d+)", show(deps));
  router.post("/post/:id(\\d+)", csrf, comment(deps));

  router.get("/register", registerForm());
  router.post("/register", csrf, register(deps));
  router.get("/login", loginForm());
  router.post("/login", csrf, login(deps));
  router.get("/logout", auth, logout());
  router.post("/logout", auth, csrf, logout());

  router.get("/about", about());
  router.get("/contact", admin, contact());

  router.get("/new-post", admin, newForm());
  router.post("/new-post", admin, csrf, create(deps));
  router.get("/edit-post/:id(\\d+)", admin, editForm(deps));
  router.post("/edit-post/:id(\\d+)", admin, csrf, update(deps));
  router.get("/delete/:id(\\d+)", admin, remove(deps));
}
