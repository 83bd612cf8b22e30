import { v4 as uuid } from 'uuid';
import type { ILogger } from '@everly/types';
import {
    NotFoundError,
    PayloadTooLargeError,
    UnsupportedMediaTypeError,
    ValidationError
} from '../../../lib/errors.js';
import { extensionOf, toWholeMegabytes } from '../../../lib/files.js';
import type { IFileStorage, IUploadedFile } from '../../../services/storage/file-storage.js';
import type { IUser, IUserDocument, IUserPreference, IUserRepository, UserChanges } from '../database/index.js';

/**
 * Limits applied to profile picture uploads.
 */
export interface IProfilePictureRules {
    maxSizeBytes: number;
    allowedTypes: readonly string[];
}

/**
 * Data needed to create a user.
 */
export interface ICreateUserInput {
    email: string;
    fullName?: string | null;
    profilePicture?: string | null;
    googleId?: string;
}

/**
 * Service for user profiles and preferences.
 *
 * Other modules reach users through this service only; the auth module
 * receives it from the users module at bootstrap and uses it to find or
 * create accounts at login.
 */
export class UserService {
    /**
     * @param repository - User persistence
     * @param storage - Where profile pictures are written
     * @param rules - Profile picture size and type limits
     * @param logger - Module logger
     */
    constructor(
        private readonly repository: IUserRepository,
        private readonly storage: IFileStorage,
        private readonly rules: IProfilePictureRules,
        private readonly logger: ILogger
    ) {}

    /**
     * Get a user's profile.
     *
     * @throws {NotFoundError} If no user has this id
     */
    async getProfile(userId: string): Promise<IUser> {
        return toUser(await this.requireDocument(userId));
    }

    async findById(userId: string): Promise<IUser | null> {
        const document = await this.repository.findById(userId);
        return document ? toUser(document) : null;
    }

    /**
     * Find a user by email address (case-insensitive).
     */
    async findByEmail(email: string): Promise<IUser | null> {
        const document = await this.repository.findByEmail(normalizeEmail(email));
        return document ? toUser(document) : null;
    }

    /**
     * Find a user by Google account id.
     */
    async findByGoogleId(googleId: string): Promise<IUser | null> {
        const document = await this.repository.findByGoogleId(googleId);
        return document ? toUser(document) : null;
    }

    /**
     * Create a regular, active user.
     *
     * @throws {ConflictError} If the email is already registered
     */
    async createUser(input: ICreateUserInput): Promise<IUser> {
        const now = new Date();
        const document: IUserDocument = {
            _id: uuid(),
            email: normalizeEmail(input.email),
            fullName: input.fullName ?? null,
            profilePicture: input.profilePicture ?? null,
            role: 'user',
            isActive: true,
            preferences: {},
            createdAt: now,
            updatedAt: now,
            lastLogin: null
        };
        if (input.googleId) {
            document.googleId = input.googleId;
        }

        await this.repository.insert(document);
        this.logger.info({ userId: document._id }, 'User created');
        return toUser(document);
    }

    /**
     * Update the display name and/or profile picture URL.
     *
     * @throws {NotFoundError} If no user has this id
     */
    async updateProfile(
        userId: string,
        changes: { fullName?: string | null; profilePicture?: string | null }
    ): Promise<IUser> {
        const update: UserChanges = {};
        if (changes.fullName !== undefined) {
            update.fullName = changes.fullName;
        }
        if (changes.profilePicture !== undefined) {
            update.profilePicture = changes.profilePicture;
        }
        return toUser(await this.applyChanges(userId, update));
    }

    /**
     * Record a successful login.
     *
     * Sets `lastLogin`, and fills the Google id and profile picture when the
     * account does not have them yet. Existing values are never overwritten.
     *
     * @throws {NotFoundError} If no user has this id
     */
    async recordLogin(userId: string, details: { googleId?: string; profilePicture?: string | null } = {}): Promise<IUser> {
        const current = await this.requireDocument(userId);
        const update: UserChanges = { lastLogin: new Date() };

        if (details.googleId && !current.googleId) {
            update.googleId = details.googleId;
        }
        if (details.profilePicture && !current.profilePicture) {
            update.profilePicture = details.profilePicture;
        }

        return toUser(await this.applyChanges(userId, update));
    }

    /**
     * List preferences as key/value pairs, sorted by key.
     *
     * @throws {NotFoundError} If no user has this id
     */
    async getPreferences(userId: string): Promise<IUserPreference[]> {
        const document = await this.requireDocument(userId);
        return toPreferenceList(document.preferences);
    }

    /**
     * Merge `preferences` into the stored ones. Keys not mentioned keep their values.
     *
     * @throws {NotFoundError} If no user has this id
     */
    async updatePreferences(userId: string, preferences: Record<string, string>): Promise<IUserPreference[]> {
        const updated = await this.repository.mergePreferences(userId, preferences, new Date());
        if (!updated) {
            throw new NotFoundError('User not found', { userId });
        }
        return toPreferenceList(updated.preferences);
    }

    /**
     * Store a new profile picture and point the profile at it.
     *
     * @throws {ValidationError} If the file is empty
     * @throws {UnsupportedMediaTypeError} If the file is not an allowed image type
     * @throws {PayloadTooLargeError} If the file exceeds the size limit
     * @throws {NotFoundError} If no user has this id
     */
    async updateProfilePicture(userId: string, file: IUploadedFile): Promise<IUser> {
        if (file.size === 0) {
            throw new ValidationError('Uploaded file is empty');
        }
        if (!this.rules.allowedTypes.includes(file.mimetype)) {
            throw new UnsupportedMediaTypeError(`File type ${file.mimetype} is not allowed`, {
                allowedTypes: this.rules.allowedTypes
            });
        }
        if (file.size > this.rules.maxSizeBytes) {
            throw new PayloadTooLargeError(
                `File size exceeds maximum allowed size of ${toWholeMegabytes(this.rules.maxSizeBytes)}MB`
            );
        }

        const current = await this.requireDocument(userId);

        const filename = `${userId}-${uuid()}.${extensionOf(file.originalname)}`;
        const stored = await this.storage.save(file.buffer, filename);
        this.logger.info({ userId, filename }, 'Profile picture stored');

        const updated = await this.applyChanges(userId, { profilePicture: stored.url });
        await this.removeStoredPicture(current.profilePicture);
        return toUser(updated);
    }

    /**
     * Delete a replaced profile picture when it lives in our storage.
     * External URLs, such as Google avatars, are left alone.
     */
    private async removeStoredPicture(url: string | null): Promise<void> {
        const prefix = this.storage.getUrl('');
        if (!url || !url.startsWith(prefix)) {
            return;
        }
        const filename = url.slice(prefix.length);
        if (filename.length === 0 || filename.includes('/')) {
            return;
        }
        try {
            await this.storage.delete(filename);
        } catch (error) {
            this.logger.warn({ error, filename }, 'Could not delete replaced profile picture');
        }
    }

    private async requireDocument(userId: string): Promise<IUserDocument> {
        const document = await this.repository.findById(userId);
        if (!document) {
            throw new NotFoundError('User not found', { userId });
        }
        return document;
    }

    private async applyChanges(userId: string, changes: UserChanges): Promise<IUserDocument> {
        const updated = await this.repository.update(userId, { ...changes, updatedAt: new Date() });
        if (!updated) {
            throw new NotFoundError('User not found', { userId });
        }
        return updated;
    }
}

/**
 * Public view of a user document.
 */
export function toUser(document: IUserDocument): IUser {
    return {
        id: document._id,
        email: document.email,
        fullName: document.fullName,
        profilePicture: document.profilePicture,
        role: document.role,
        isActive: document.isActive,
        createdAt: document.createdAt,
        updatedAt: document.updatedAt,
        lastLogin: document.lastLogin
    };
}

function toPreferenceList(preferences: Record<string, string>): IUserPreference[] {
    return Object.keys(preferences)
        .sort()
        .map(key => ({ key, value: preferences[key] }));
}

function normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
}
