export { AuthModule } from './AuthModule.js';
export type { IAuthModuleConfig, IAuthModuleOverrides } from './AuthModule.js';
export { AuthService, AxiosGoogleUserInfoClient } from './services/index.js';
export type { IGoogleUserInfoClient, GoogleUserInfo, ILoginResult } from './services/index.js';
