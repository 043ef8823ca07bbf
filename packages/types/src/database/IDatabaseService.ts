import type { mongo } from 'mongoose';

/**
 * Database access shared by the core repositories.
 *
 * Repositories get raw driver collections for their queries and draw numeric
 * ids from named sequences. The interface keeps Mongoose out of repository
 * code and lets tests swap the whole persistence layer for in-memory fakes.
 */
export interface IDatabaseService {
    /**
     * Get a native driver collection.
     *
     * @param name - Collection name (`menu_definition`, `extension_definition`, ...)
     * @throws Error if the connection is not established
     */
    getCollection<T extends mongo.Document = mongo.Document>(name: string): mongo.Collection<T>;

    /**
     * Atomically increment and return the named sequence, starting at 1.
     *
     * @param sequence - Sequence name, conventionally the collection it numbers
     */
    nextSequence(sequence: string): Promise<number>;

    /**
     * Create an index if it does not exist yet.
     */
    createIndex(
        collectionName: string,
        indexSpec: mongo.IndexSpecification,
        options?: mongo.CreateIndexesOptions
    ): Promise<void>;
}
