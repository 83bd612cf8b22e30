import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { ILogger } from '@everly/types';
import { UnauthorizedError } from '../../../lib/errors.js';

const userInfoSchema = z.object({
    sub: z.string().min(1),
    email: z.string().email().optional(),
    name: z.string().optional(),
    picture: z.string().optional()
});

/**
 * Profile returned by Google's OAuth2 userinfo endpoint.
 */
export type GoogleUserInfo = z.infer<typeof userInfoSchema>;

/**
 * Source of Google account profiles for an OAuth access token.
 */
export interface IGoogleUserInfoClient {
    /**
     * Resolve the account an access token belongs to.
     *
     * @throws {UnauthorizedError} When Google rejects the token or answers with an unexpected payload
     */
    fetchUserInfo(accessToken: string): Promise<GoogleUserInfo>;
}

/**
 * Calls the userinfo endpoint with the client's access token as bearer credentials.
 */
export class AxiosGoogleUserInfoClient implements IGoogleUserInfoClient {
    constructor(
        private readonly userInfoUrl: string,
        private readonly logger: ILogger,
        private readonly http: AxiosInstance = axios.create({ timeout: 10000 })
    ) {}

    async fetchUserInfo(accessToken: string): Promise<GoogleUserInfo> {
        let data: unknown;
        try {
            const response = await this.http.get<unknown>(this.userInfoUrl, {
                headers: { Authorization: `Bearer ${accessToken}` }
            });
            data = response.data;
        } catch (error) {
            if (axios.isAxiosError(error) && error.response) {
                this.logger.warn(
                    { status: error.response.status, body: error.response.data },
                    'Google rejected the access token'
                );
                throw new UnauthorizedError('Could not validate Google credentials', {
                    status: error.response.status
                });
            }
            this.logger.error({ error }, 'Google userinfo request failed');
            throw new UnauthorizedError('Could not validate Google credentials');
        }

        const parsed = userInfoSchema.safeParse(data);
        if (!parsed.success) {
            this.logger.warn({ issues: parsed.error.issues }, 'Unexpected Google userinfo payload');
            throw new UnauthorizedError('Could not validate Google credentials');
        }
        return parsed.data;
    }
}
