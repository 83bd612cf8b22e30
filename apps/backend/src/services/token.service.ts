import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import type { IAuthContext } from '@everly/types';
import { UnauthorizedError } from '../lib/errors.js';

/**
 * Token settings, mapped from `JWT_SECRET` and `JWT_EXPIRES_IN_MINUTES`.
 */
export interface ITokenServiceConfig {
    secret: string;
    expiresInMinutes: number;
}

const claimsSchema = z.object({
    sub: z.string().min(1),
    email: z.string(),
    role: z.enum(['user', 'admin'])
});

/**
 * Signs and verifies the HS256 access tokens issued after a Google login.
 *
 * The token subject is the user id; `email` and `role` travel as claims so the
 * authentication guard can build `req.auth` without a database round trip.
 */
export class TokenService {
    private static readonly ALGORITHM = 'HS256';

    constructor(private readonly config: ITokenServiceConfig) {}

    /**
     * Issue an access token for an authenticated user.
     */
    sign(context: IAuthContext): string {
        return jwt.sign({ email: context.email, role: context.role }, this.config.secret, {
            algorithm: TokenService.ALGORITHM,
            subject: context.userId,
            expiresIn: this.config.expiresInMinutes * 60
        });
    }

    /**
     * Verify a token and return the identity it carries.
     *
     * @throws {UnauthorizedError} When the token is malformed, expired, signed with another key or lacks claims
     */
    verify(token: string): IAuthContext {
        let decoded: string | JwtPayload;
        try {
            decoded = jwt.verify(token, this.config.secret, { algorithms: [TokenService.ALGORITHM] });
        } catch (error) {
            const reason = error instanceof jwt.TokenExpiredError ? 'Token expired' : 'Invalid token';
            throw new UnauthorizedError(reason);
        }

        const claims = claimsSchema.safeParse(decoded);
        if (!claims.success) {
            throw new UnauthorizedError('Invalid token claims');
        }

        return { userId: claims.data.sub, email: claims.data.email, role: claims.data.role };
    }

    /** Access token lifetime in seconds, reported to clients at login. */
    get expiresInSeconds(): number {
        return this.config.expiresInMinutes * 60;
    }
}
