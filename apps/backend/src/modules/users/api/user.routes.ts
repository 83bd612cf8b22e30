import multer from 'multer';
import type { IApiRouteConfig } from '@everly/types';
import { validateBody } from '../../../api/middleware/validate.js';
import type { UserController } from './user.controller.js';
import { updatePreferencesSchema, updateProfileSchema } from './user.schemas.js';

/**
 * Build the users module routes.
 *
 * All routes require authentication. Profile pictures are parsed into memory
 * with a hard size limit; type and size are checked again by the service.
 *
 * @param controller - User controller instance
 * @param maxProfileImageSize - Multipart size limit in bytes
 */
export function createUserRoutes(controller: UserController, maxProfileImageSize: number): IApiRouteConfig[] {
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: maxProfileImageSize, files: 1 }
    });

    return [
        {
            method: 'GET',
            path: '/me',
            requiresAuth: true,
            handler: controller.getMe.bind(controller),
            description: 'Current user profile'
        },
        {
            method: 'PUT',
            path: '/me',
            requiresAuth: true,
            middleware: [validateBody(updateProfileSchema)],
            handler: controller.updateMe.bind(controller),
            description: 'Update display name or profile picture URL'
        },
        {
            method: 'PUT',
            path: '/me/profile-picture',
            requiresAuth: true,
            middleware: [upload.single('file')],
            handler: controller.updateProfilePicture.bind(controller),
            description: 'Upload a new profile picture'
        },
        {
            method: 'GET',
            path: '/me/preferences',
            requiresAuth: true,
            handler: controller.getPreferences.bind(controller),
            description: 'List preferences'
        },
        {
            method: 'PUT',
            path: '/me/preferences',
            requiresAuth: true,
            middleware: [validateBody(updatePreferencesSchema)],
            handler: controller.updatePreferences.bind(controller),
            description: 'Merge preferences'
        }
    ];
}
