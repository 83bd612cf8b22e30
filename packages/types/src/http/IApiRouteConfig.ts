import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * HTTP methods a module route can answer.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Route handler signature.
 *
 * Handlers may return a promise; the route aggregator forwards a rejection to
 * Express's error middleware, so handlers do not need their own try/catch.
 *
 * @example
 * ```typescript
 * const handler: ApiRouteHandler = async (req, res) => {
 *     const diaries = await diaryService.listDiaries(getAuthContext(req).userId);
 *     res.json({ success: true, data: diaries });
 * };
 * ```
 */
export type ApiRouteHandler = (req: Request, res: Response, next: NextFunction) => void | Promise<void>;

/**
 * A single route exposed by a module.
 *
 * The path is relative to the module's namespace: a `users` module route with
 * path `/me` answers at `/api/v1/users/me`.
 *
 * @example
 * ```typescript
 * const route: IApiRouteConfig = {
 *     method: 'PUT',
 *     path: '/me/preferences',
 *     requiresAuth: true,
 *     middleware: [validateBody(preferencesSchema)],
 *     handler: controller.updatePreferences,
 *     description: 'Merge preference keys into the current user profile'
 * };
 * ```
 */
export interface IApiRouteConfig {
    /** HTTP method for this route. */
    method: HttpMethod;

    /**
     * Path relative to the module namespace. Supports Express parameters
     * such as `/:diaryId/entries`.
     */
    path: string;

    /** Final handler for the route. */
    handler: ApiRouteHandler;

    /**
     * Run the application's authentication guard before any other middleware.
     *
     * Default: false (public route)
     */
    requiresAuth?: boolean;

    /**
     * Middleware that runs, in order, after authentication and before the
     * handler. Validation and multipart parsing live here.
     */
    middleware?: RequestHandler[];

    /**
     * What the route does, listed by the system route table.
     */
    description?: string;
}
