import type { Request, Response } from 'express';
import { getAuthContext } from '../../../api/middleware/require-auth.js';
import type { AuthService } from '../services/index.js';
import type { GoogleLoginBody } from './auth.schemas.js';

/**
 * Controller for the auth module REST API, mounted at /api/v1/auth.
 */
export class AuthController {
    constructor(private readonly authService: AuthService) {}

    /**
     * POST /api/v1/auth/google
     *
     * Body: { token } (Google OAuth access token)
     * Response: { accessToken, tokenType, expiresIn, user }
     */
    async loginWithGoogle(req: Request, res: Response): Promise<void> {
        const body: GoogleLoginBody = req.body;
        res.json(await this.authService.loginWithGoogle(body.token));
    }

    /**
     * GET /api/v1/auth/me
     */
    async getMe(req: Request, res: Response): Promise<void> {
        const { userId } = getAuthContext(req);
        res.json(await this.authService.getCurrentUser(userId));
    }
}
