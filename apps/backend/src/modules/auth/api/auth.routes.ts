import type { IApiRouteConfig } from '@everly/types';
import { validateBody } from '../../../api/middleware/validate.js';
import type { AuthController } from './auth.controller.js';
import { googleLoginSchema } from './auth.schemas.js';

export function createAuthRoutes(controller: AuthController): IApiRouteConfig[] {
    return [
        {
            method: 'POST',
            path: '/google',
            middleware: [validateBody(googleLoginSchema)],
            handler: controller.loginWithGoogle.bind(controller),
            description: 'Exchange a Google OAuth access token for an access token'
        },
        {
            method: 'GET',
            path: '/me',
            requiresAuth: true,
            handler: controller.getMe.bind(controller),
            description: 'Current authenticated user'
        }
    ];
}
