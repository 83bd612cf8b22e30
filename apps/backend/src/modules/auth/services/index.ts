export { AuthService, type ILoginResult } from './auth.service.js';
export {
    AxiosGoogleUserInfoClient,
    type GoogleUserInfo,
    type IGoogleUserInfoClient
} from './google-userinfo.client.js';
