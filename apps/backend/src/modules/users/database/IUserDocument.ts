import type { UserRole } from '@everly/types';

/**
 * User record as stored in the `users` collection.
 *
 * `_id` is a UUID string generated by the service. `googleId` is left out of
 * the document until the user first signs in with Google, so the sparse
 * unique index on it never sees more than one value per account.
 */
export interface IUserDocument {
    _id: string;
    /** Lower-cased email address, unique across users. */
    email: string;
    fullName: string | null;
    /** Public URL of the profile picture. */
    profilePicture: string | null;
    googleId?: string;
    role: UserRole;
    /** Inactive users are refused at login. */
    isActive: boolean;
    /** Free-form client preferences such as `{ theme: 'dark' }`. */
    preferences: Record<string, string>;
    createdAt: Date;
    updatedAt: Date;
    lastLogin: Date | null;
}

/**
 * User as returned by the API.
 */
export interface IUser {
    id: string;
    email: string;
    fullName: string | null;
    profilePicture: string | null;
    role: UserRole;
    isActive: boolean;
    createdAt: Date;
    updatedAt: Date;
    lastLogin: Date | null;
}

/**
 * One preference entry as returned by the API.
 */
export interface IUserPreference {
    key: string;
    value: string;
}
