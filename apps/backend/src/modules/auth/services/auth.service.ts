import type { ILogger } from '@everly/types';
import { ForbiddenError, ValidationError } from '../../../lib/errors.js';
import type { TokenService } from '../../../services/token.service.js';
import type { IUser, UserService } from '../../users/index.js';
import type { IGoogleUserInfoClient } from './google-userinfo.client.js';

/**
 * Result of a successful login.
 */
export interface ILoginResult {
    accessToken: string;
    tokenType: 'bearer';
    expiresIn: number;
    user: IUser;
}

/**
 * Google sign-in.
 *
 * Exchanges a Google OAuth access token for an Everly access token. Accounts
 * are matched by email first and Google id second; a first login creates the
 * account.
 */
export class AuthService {
    constructor(
        private readonly users: UserService,
        private readonly google: IGoogleUserInfoClient,
        private readonly tokens: TokenService,
        private readonly logger: ILogger
    ) {}

    /**
     * Log in with a Google OAuth access token.
     *
     * @throws {UnauthorizedError} When Google does not accept the token
     * @throws {ValidationError} When the Google account has no email address
     * @throws {ForbiddenError} When the account has been deactivated
     */
    async loginWithGoogle(googleAccessToken: string): Promise<ILoginResult> {
        const profile = await this.google.fetchUserInfo(googleAccessToken);
        if (!profile.email) {
            throw new ValidationError('Email not provided by Google authentication');
        }

        let user = (await this.users.findByEmail(profile.email)) ?? (await this.users.findByGoogleId(profile.sub));

        if (!user) {
            user = await this.users.createUser({
                email: profile.email,
                fullName: profile.name ?? profile.email.split('@')[0],
                profilePicture: profile.picture ?? null,
                googleId: profile.sub
            });
        }

        if (!user.isActive) {
            this.logger.warn({ userId: user.id }, 'Login refused for inactive user');
            throw new ForbiddenError('User account is inactive');
        }

        user = await this.users.recordLogin(user.id, { googleId: profile.sub, profilePicture: profile.picture });

        const accessToken = this.tokens.sign({ userId: user.id, email: user.email, role: user.role });
        this.logger.info({ userId: user.id }, 'User logged in with Google');

        return { accessToken, tokenType: 'bearer', expiresIn: this.tokens.expiresInSeconds, user };
    }

    /**
     * Profile of the user a verified token belongs to.
     *
     * @throws {NotFoundError} When the account no longer exists
     */
    async getCurrentUser(userId: string): Promise<IUser> {
        return this.users.getProfile(userId);
    }
}
