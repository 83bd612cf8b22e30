/**
 * Route configuration types shared between modules and the route aggregator.
 */
export type { IApiRouteConfig, HttpMethod, ApiRouteHandler } from './IApiRouteConfig.js';
