// backend/services/blog/src/views/authViews.ts
import type { SafeHtml } from "../../../shared/src/view/html";
import type { FormState, LoginForm, RegisterForm } from "../validators/forms";
import { form } from "./formFields";
import { layout, type PageContext } from "./layout";

const AUTH_BG = "/static/img/login-bg.svg";

export function registerView(
  page: PageContext,
  state: FormState<RegisterForm>
): SafeHtml {
  return layout(
    page,
    { title: "Register", heading: "Register", subheading: "Start Contributing to the Blog!", bgImage: AUTH_BG },
    form<RegisterForm>(page, {
      action: "/register",
      submit: "Sign Me Up!",
      fields: [
        { name: "email", label: "Email", type: "email" },
        { name: "password", label: "Password", type: "password" },
        { name: "name", label: "Name" },
      ],
      state,
    })
  );
}

export function loginView(page: PageContext, state: FormState<LoginForm>): SafeHtml {
  return layout(
    page,
    { title: "Log In", heading: "Log In", subheading: "Welcome Back!", bgImage: AUTH_BG },
    form<LoginForm>(page, {
      action: "/login",
      submit: "Let Me In!",
      fields: [
        { name: "email", label: "Email", type: "email" },
        { name: "password", label: "Password", type: "password" },
      ],
      state,
    })
  );
}
