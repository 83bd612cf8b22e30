import { Router, type RequestHandler } from 'express';
import type { HttpMethod, IApiRouteConfig, ILogger } from '@everly/types';
import { asyncHandler } from '../../api/middleware/async-handler.js';
import type { ICreateRouterOptions, IRouteTableEntry } from './types.js';

/**
 * A ready module and the routes it exposes, in initialization order.
 */
export interface IMountableModule {
    name: string;
    routes: readonly IApiRouteConfig[];
}

/**
 * Join a module namespace and a module-relative route path.
 *
 * `('diaries', '/')` gives `/diaries`; `('diaries', '/:diaryId')` gives
 * `/diaries/:diaryId`.
 */
export function joinRoutePath(moduleName: string, path: string): string {
    const relative = path === '/' || path === '' ? '' : path.startsWith('/') ? path : `/${path}`;
    return `/${moduleName}${relative}`;
}

/**
 * Build one Express router carrying every module's routes under `/<name>`.
 *
 * For each route the chain is: the authentication guard when `requiresAuth`
 * is set, then the route's own middleware in order, then the handler. Every
 * link is wrapped so that a thrown error or a rejected promise reaches the
 * Express error middleware through `next`.
 *
 * @param modules - Ready modules in initialization order
 * @param options - Authentication guard for protected routes
 * @param logger - Logger for route registration diagnostics
 */
export function buildModuleRouter(
    modules: readonly IMountableModule[],
    options: ICreateRouterOptions,
    logger: ILogger
): Router {
    const root = Router();

    for (const { name, routes } of modules) {
        const router = Router();

        for (const route of routes) {
            registerRoute(router, name, route, options, logger);
        }

        root.use(`/${name}`, router);
        logger.info({ module: name, routeCount: routes.length }, `Mounted ${routes.length} route(s) under /${name}`);
    }

    return root;
}

/**
 * List every route the aggregated router answers, in mount order.
 */
export function buildRouteTable(modules: readonly IMountableModule[]): IRouteTableEntry[] {
    return modules.flatMap(({ name, routes }) =>
        routes.map(route => ({
            module: name,
            method: route.method,
            path: joinRoutePath(name, route.path),
            requiresAuth: route.requiresAuth ?? false,
            description: route.description
        }))
    );
}

function registerRoute(
    router: Router,
    moduleName: string,
    route: IApiRouteConfig,
    options: ICreateRouterOptions,
    logger: ILogger
): void {
    const { method, path, handler, middleware = [], requiresAuth = false } = route;

    const chain: RequestHandler[] = [];
    if (requiresAuth) {
        chain.push(asyncHandler(options.authenticate));
    }
    chain.push(...middleware.map(link => asyncHandler(link)));
    chain.push(asyncHandler(handler));

    mountChain(router, method, path, chain);

    logger.debug(
        { module: moduleName, method, path: joinRoutePath(moduleName, path), requiresAuth },
        `Registered route: ${method} ${path}`
    );
}

function mountChain(router: Router, method: HttpMethod, path: string, chain: RequestHandler[]): void {
    switch (method) {
        case 'GET':
            router.get(path, ...chain);
            break;
        case 'POST':
            router.post(path, ...chain);
            break;
        case 'PUT':
            router.put(path, ...chain);
            break;
        case 'PATCH':
            router.patch(path, ...chain);
            break;
        case 'DELETE':
            router.delete(path, ...chain);
            break;
    }
}
