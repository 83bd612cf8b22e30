import mongoose, { type mongo } from 'mongoose';
import type { IDatabaseService, IIndexOptions, ILogger } from '@everly/types';

/**
 * Database service lent to every module through the shared infrastructure.
 *
 * Wraps the process's single Mongoose connection and hands out native driver
 * collections. Modules layer their own repositories on top; the service
 * itself keeps no state besides the connection reference.
 *
 * Collection names are sanitized so that a logical name such as
 * `diary_entries` always maps to the same physical collection and never
 * carries characters MongoDB rejects.
 *
 * @example
 * ```typescript
 * const database = new DatabaseService(logger);
 * const users = database.getCollection<IUserDocument>('users');
 * await database.createIndex('users', { email: 1 }, { unique: true });
 * ```
 */
export class DatabaseService implements IDatabaseService {
    /**
     * @param logger - Logger for index and ping diagnostics
     * @param connection - Mongoose connection, the default connection unless a test supplies one
     */
    constructor(
        private readonly logger: ILogger,
        private readonly connection: Pick<mongoose.Connection, 'db'> = mongoose.connection
    ) {}

    /**
     * Get a native MongoDB collection.
     *
     * @param name - Logical collection name
     * @throws Error if MongoDB connection not established
     */
    public getCollection<T extends mongo.Document = mongo.Document>(name: string): mongo.Collection<T> {
        return this.getDb().collection<T>(this.getPhysicalCollectionName(name));
    }

    /**
     * Create an index, doing nothing when an identical one already exists.
     *
     * @param collectionName - Logical collection name
     * @param keys - Index specification
     * @param options - Uniqueness and sparseness flags
     */
    public async createIndex(
        collectionName: string,
        keys: Record<string, 1 | -1>,
        options: IIndexOptions = {}
    ): Promise<void> {
        const name = await this.getCollection(collectionName).createIndex(keys, options);
        this.logger.debug({ collection: collectionName, index: name }, 'Ensured index');
    }

    /**
     * Send a `ping` command to the server.
     *
     * @returns False when the connection is missing or the command fails
     */
    public async ping(): Promise<boolean> {
        const db = this.connection.db;
        if (!db) {
            return false;
        }

        try {
            await db.command({ ping: 1 });
            return true;
        } catch (error) {
            this.logger.warn({ error }, 'MongoDB ping failed');
            return false;
        }
    }

    private getDb(): mongo.Db {
        const db = this.connection.db;
        if (!db) {
            throw new Error('MongoDB connection not established');
        }
        return db;
    }

    private getPhysicalCollectionName(logicalName: string): string {
        if (!logicalName) {
            throw new Error('Collection name must be a non-empty string');
        }
        return logicalName.replace(/[^a-zA-Z0-9_-]/g, '_');
    }
}
