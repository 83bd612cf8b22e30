import type { mongo } from 'mongoose';

/**
 * Index options accepted by {@link IDatabaseService.createIndex}.
 */
export interface IIndexOptions {
    unique?: boolean;
    sparse?: boolean;
}

/**
 * Persistence handle shared by the process and lent to every module.
 *
 * Wraps the single Mongoose connection the process opens at startup. Modules
 * reach MongoDB through typed native collections and build their own
 * repositories on top; they never open or close connections themselves.
 *
 * @example
 * ```typescript
 * const diaries = database.getCollection<IDiaryDocument>('diaries');
 * await database.createIndex('diaries', { userId: 1, createdAt: -1 });
 * const latest = await diaries.find({ userId }).sort({ createdAt: -1 }).limit(10).toArray();
 * ```
 */
export interface IDatabaseService {
    /**
     * Get a native MongoDB collection.
     *
     * @param name - Collection name
     * @throws {Error} If the connection has not been established
     */
    getCollection<T extends mongo.Document = mongo.Document>(name: string): mongo.Collection<T>;

    /**
     * Create an index if it does not exist yet.
     *
     * @param collectionName - Collection to index
     * @param keys - Index key specification, e.g. `{ email: 1 }`
     * @param options - Uniqueness and sparseness flags
     */
    createIndex(collectionName: string, keys: Record<string, 1 | -1>, options?: IIndexOptions): Promise<void>;

    /**
     * Check that the server answers.
     *
     * @returns True when a `ping` command succeeds, false otherwise
     */
    ping(): Promise<boolean>;
}
