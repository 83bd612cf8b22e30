export type { IUserDocument, IUser, IUserPreference } from './IUserDocument.js';
export type { IUserRepository, UserChanges } from './user.repository.js';
export { MongoUserRepository, USERS_COLLECTION } from './user.repository.js';
