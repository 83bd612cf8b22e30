/**
 * Role carried in an access token.
 */
export type UserRole = 'user' | 'admin';

/**
 * Identity attached to a request by the authentication guard.
 *
 * Derived from a verified access token. Handlers of routes marked
 * `requiresAuth` can rely on `req.auth` being set.
 */
export interface IAuthContext {
    /** Id of the authenticated user (the token subject). */
    userId: string;

    /** Email address recorded in the token. */
    email: string;

    /** Role recorded in the token. */
    role: UserRole;
}
