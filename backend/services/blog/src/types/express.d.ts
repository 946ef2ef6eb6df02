// backend/services/blog/src/types/express.d.ts

import type { BlogSession } from "../session/session";

declare global {
  namespace Express {
    interface Request {
      session?: BlogSession;
    }
  }
}

export {};
