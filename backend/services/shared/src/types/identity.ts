// backend/services/shared/src/types/identity.ts

/** The authenticated user bound to the current request, as resolved by the session layer. */
export interface RequestIdentity {
  id: number;
  email: string;
  name: string;
}
