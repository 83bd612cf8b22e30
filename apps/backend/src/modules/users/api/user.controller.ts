import type { Request, Response } from 'express';
import { getAuthContext } from '../../../api/middleware/require-auth.js';
import { ValidationError } from '../../../lib/errors.js';
import type { UserService } from '../services/index.js';
import type { UpdatePreferencesBody, UpdateProfileBody } from './user.schemas.js';

/**
 * Controller for the users module REST API.
 *
 * Every endpoint acts on the authenticated user; there is no way to read or
 * change another account through this controller. Errors propagate to the
 * application error handler.
 *
 * Routes are mounted at /api/v1/users.
 */
export class UserController {
    /**
     * @param userService - Service for profile and preference operations
     */
    constructor(private readonly userService: UserService) {}

    /**
     * GET /api/v1/users/me
     *
     * Response: IUser
     */
    async getMe(req: Request, res: Response): Promise<void> {
        const { userId } = getAuthContext(req);
        res.json(await this.userService.getProfile(userId));
    }

    /**
     * PUT /api/v1/users/me
     *
     * Body: { fullName?, profilePicture? }
     * Response: IUser
     */
    async updateMe(req: Request, res: Response): Promise<void> {
        const { userId } = getAuthContext(req);
        const body: UpdateProfileBody = req.body;
        res.json(await this.userService.updateProfile(userId, body));
    }

    /**
     * PUT /api/v1/users/me/profile-picture
     *
     * Multipart field: file
     * Response: IUser
     */
    async updateProfilePicture(req: Request, res: Response): Promise<void> {
        const { userId } = getAuthContext(req);
        if (!req.file) {
            throw new ValidationError('No file uploaded', { field: 'file' });
        }
        res.json(await this.userService.updateProfilePicture(userId, req.file));
    }

    /**
     * GET /api/v1/users/me/preferences
     *
     * Response: Array<{ key, value }>
     */
    async getPreferences(req: Request, res: Response): Promise<void> {
        const { userId } = getAuthContext(req);
        res.json(await this.userService.getPreferences(userId));
    }

    /**
     * PUT /api/v1/users/me/preferences
     *
     * Body: { [key]: value }, merged into the stored preferences
     * Response: Array<{ key, value }>
     */
    async updatePreferences(req: Request, res: Response): Promise<void> {
        const { userId } = getAuthContext(req);
        const body: UpdatePreferencesBody = req.body;
        res.json(await this.userService.updatePreferences(userId, body));
    }
}
