import type { Request, RequestHandler } from 'express';
import type { IAuthContext } from '@everly/types';
import { ForbiddenError, UnauthorizedError } from '../../lib/errors.js';
import type { TokenService } from '../../services/token.service.js';
import { asyncHandler } from './async-handler.js';

/**
 * Looks up the account behind a token subject, null when it no longer exists.
 */
export type AccountLookup = (userId: string) => Promise<{ isActive: boolean } | null>;

/**
 * Build the authentication guard run before every `requiresAuth` route.
 *
 * Reads `Authorization: Bearer <token>`, verifies it, then loads the account
 * it was issued for: a deleted account gets a 401 and a deactivated one a
 * 403, even while the token itself is still valid. On success the identity is
 * attached as `req.auth`.
 *
 * @param tokens - Token service that issued the access tokens
 * @param findAccount - Account lookup, backed by the users module
 */
export function createRequireAuth(tokens: TokenService, findAccount: AccountLookup): RequestHandler {
    return asyncHandler(async (req, _res, next) => {
        const header = req.headers.authorization;
        if (!header || !header.startsWith('Bearer ')) {
            throw new UnauthorizedError('Missing or malformed Authorization header');
        }

        const identity = tokens.verify(header.slice('Bearer '.length).trim());
        const account = await findAccount(identity.userId);
        if (!account) {
            throw new UnauthorizedError('User not found');
        }
        if (!account.isActive) {
            throw new ForbiddenError('User account is inactive');
        }

        req.auth = identity;
        next();
    });
}

/**
 * Read the identity a guarded handler runs under.
 *
 * @throws {UnauthorizedError} When the guard did not run for this request
 */
export function getAuthContext(req: Request): IAuthContext {
    if (!req.auth) {
        throw new UnauthorizedError();
    }
    return req.auth;
}
