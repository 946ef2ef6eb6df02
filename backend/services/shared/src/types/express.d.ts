// backend/services/shared/src/types/express.d.ts

import type { RequestIdentity } from "./identity";

/**
 * Global Express request augmentation used by all services.
 * - identity: set by the session middleware; null for anonymous callers
 */
declare global {
  namespace Express {
    interface Request {
      identity?: RequestIdentity | null;
    }
  }
}

export {};
