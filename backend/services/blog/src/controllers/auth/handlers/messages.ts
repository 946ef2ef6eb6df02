// backend/services/blog/src/controllers/auth/handlers/messages.ts

export const ALREADY_REGISTERED =
  "You've already signed up with that email, log in instead!";
export const INCORRECT_PASSWORD = "Incorrect password";
