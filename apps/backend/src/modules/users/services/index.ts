export { UserService, toUser } from './user.service.js';
export type { IProfilePictureRules, ICreateUserInput } from './user.service.js';
