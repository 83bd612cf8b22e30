import type { IApiRouteConfig, IHealthSnapshot, IModule, IModuleDescriptor, ISharedInfrastructure } from '@everly/types';
import type { TokenService } from '../../services/token.service.js';
import type { UsersModule } from '../users/index.js';
import { AuthService, AxiosGoogleUserInfoClient, type IGoogleUserInfoClient } from './services/index.js';
import { AuthController } from './api/auth.controller.js';
import { createAuthRoutes } from './api/auth.routes.js';

/**
 * Configuration of the auth module.
 */
export interface IAuthModuleConfig {
    /** Google OAuth2 userinfo endpoint. */
    googleUserInfoUrl: string;
}

export interface IAuthModuleOverrides {
    googleClient?: IGoogleUserInfoClient;
}

const HEALTH_PROBE = { userId: 'health-probe', email: 'health-probe@everly.local', role: 'user' } as const;

/**
 * Auth module: Google sign-in and the current-user endpoint.
 *
 * Receives the users module and the process's {@link TokenService} from the
 * entry point. The same token service backs the authentication guard that the
 * module router runs before every `requiresAuth` route, so tokens issued here
 * are the ones every other module accepts.
 */
export class AuthModule implements IModule {
    private controller?: AuthController;

    constructor(
        private readonly usersModule: UsersModule,
        private readonly tokens: TokenService,
        private readonly config: IAuthModuleConfig,
        private readonly overrides: IAuthModuleOverrides = {}
    ) {}

    identity(): IModuleDescriptor {
        return {
            name: 'auth',
            version: '1.0.0',
            description: 'Google sign-in and access tokens',
            dependencies: ['users']
        };
    }

    async initialize(infrastructure: ISharedInfrastructure): Promise<void> {
        const logger = infrastructure.logger.child({ module: 'auth' });

        const googleClient =
            this.overrides.googleClient ?? new AxiosGoogleUserInfoClient(this.config.googleUserInfoUrl, logger);
        const authService = new AuthService(this.usersModule.getUserService(), googleClient, this.tokens, logger);
        this.controller = new AuthController(authService);

        logger.info('Auth module initialized');
    }

    routes(): readonly IApiRouteConfig[] {
        return this.controller ? createAuthRoutes(this.controller) : [];
    }

    async cleanup(): Promise<void> {
        this.controller = undefined;
    }

    async health(): Promise<IHealthSnapshot> {
        const tokenRoundTrip = this.checkTokenRoundTrip();
        const googleConfigured = this.config.googleUserInfoUrl.length > 0;

        return {
            moduleName: 'auth',
            healthy: tokenRoundTrip && googleConfigured,
            detail: { tokenRoundTrip, googleConfigured },
            checkedAt: new Date()
        };
    }

    private checkTokenRoundTrip(): boolean {
        try {
            return this.tokens.verify(this.tokens.sign(HEALTH_PROBE)).userId === HEALTH_PROBE.userId;
        } catch {
            return false;
        }
    }
}
