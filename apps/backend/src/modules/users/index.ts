export { UsersModule } from './UsersModule.js';
export type { IUsersModuleConfig, IUsersModuleOverrides } from './UsersModule.js';
export { UserService } from './services/index.js';
export type { IUser, IUserPreference, IUserRepository, IUserDocument } from './database/index.js';
