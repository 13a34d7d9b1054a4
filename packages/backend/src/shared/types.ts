import 'express';

export interface AuthenticatedUser {
  /** Resolved from the users table by the admin check; the token's claim until then. */
  userId: string;
  name: string;
  isAdmin?: boolean;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      id?: string;
      user?: AuthenticatedUser;
    }
  }
}
