/** Snapshot of the authenticated session as reported by the server's login. */
export interface SessionInfo {
  userId: string;
  roles: string[];
  /** Epoch milliseconds */
  expiresAt?: number;
}

export type AuthState = 'anonymous' | 'authenticated' | 'revoked';

export const AUTH_LOGIN = 'auth.login';
export const AUTH_LOGOUT = 'auth.logout';
export const IDENTITY_LOGIN = 'identity.login';

/** Operations still allowed after the server revoked the session. */
export const LOGIN_OPERATIONS: ReadonlySet<string> = new Set([AUTH_LOGIN, IDENTITY_LOGIN]);
