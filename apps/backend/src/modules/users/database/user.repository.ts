import { mongo } from 'mongoose';
import type { IDatabaseService } from '@everly/types';
import { ConflictError } from '../../../lib/errors.js';
import type { IUserDocument } from './IUserDocument.js';

/**
 * Fields of a user document that can change after creation.
 */
export type UserChanges = Partial<Omit<IUserDocument, '_id' | 'createdAt'>>;

/**
 * Persistence boundary of the users module.
 */
export interface IUserRepository {
    findById(id: string): Promise<IUserDocument | null>;
    findByEmail(email: string): Promise<IUserDocument | null>;
    findByGoogleId(googleId: string): Promise<IUserDocument | null>;

    /**
     * @throws {ConflictError} When the email or Google id is already taken
     */
    insert(user: IUserDocument): Promise<void>;

    /**
     * Apply `changes` and return the updated document, or null when no user has `id`.
     */
    update(id: string, changes: UserChanges): Promise<IUserDocument | null>;

    /**
     * Merge `preferences` into the stored map in one write, so concurrent
     * merges of different keys all survive. Returns null when no user has `id`.
     */
    mergePreferences(id: string, preferences: Record<string, string>, updatedAt: Date): Promise<IUserDocument | null>;
}

export const USERS_COLLECTION = 'users';

const DUPLICATE_KEY = 11000;

/**
 * IUserRepository over the shared MongoDB connection.
 *
 * Collections are looked up per call, so the repository can be built before
 * the connection is open.
 */
export class MongoUserRepository implements IUserRepository {
    constructor(private readonly database: IDatabaseService) {}

    async findById(id: string): Promise<IUserDocument | null> {
        return this.collection().findOne({ _id: id });
    }

    async findByEmail(email: string): Promise<IUserDocument | null> {
        return this.collection().findOne({ email });
    }

    async findByGoogleId(googleId: string): Promise<IUserDocument | null> {
        return this.collection().findOne({ googleId });
    }

    async insert(user: IUserDocument): Promise<void> {
        try {
            await this.collection().insertOne(user);
        } catch (error) {
            if (error instanceof mongo.MongoServerError && error.code === DUPLICATE_KEY) {
                throw new ConflictError('A user with this email already exists', { email: user.email });
            }
            throw error;
        }
    }

    async update(id: string, changes: UserChanges): Promise<IUserDocument | null> {
        return this.collection().findOneAndUpdate(
            { _id: id },
            { $set: changes },
            { returnDocument: 'after' }
        );
    }

    async mergePreferences(
        id: string,
        preferences: Record<string, string>,
        updatedAt: Date
    ): Promise<IUserDocument | null> {
        return this.collection().findOneAndUpdate(
            { _id: id },
            [{ $set: { preferences: { $mergeObjects: ['$preferences', { $literal: preferences }] }, updatedAt } }],
            { returnDocument: 'after' }
        );
    }

    private collection(): mongo.Collection<IUserDocument> {
        return this.database.getCollection<IUserDocument>(USERS_COLLECTION);
    }
}
