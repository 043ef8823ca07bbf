import type { Connection, mongo } from 'mongoose';
import type { IDatabaseService, ILogger } from '@enfyra/types';

/**
 * Document shape of the `counters` collection backing numeric id sequences.
 */
interface ICounterDocument {
    _id: string;
    seq: number;
}

const COUNTERS_COLLECTION = 'counters';

/**
 * Database service providing driver-level access to MongoDB.
 *
 * Repositories receive raw collections for their queries. Numeric record ids
 * (menus and extensions are addressed by integers, not ObjectIds) come from
 * atomic counters stored in the `counters` collection.
 *
 * The Mongoose connection is injected so unit tests can pass a stub connection
 * and integration setups can pass a real one.
 *
 * @example
 * ```typescript
 * import mongoose from 'mongoose';
 * const db = new DatabaseService(logger, mongoose.connection);
 * const id = await db.nextSequence('extension_definition'); // 1, 2, 3, ...
 * ```
 */
export class DatabaseService implements IDatabaseService {
    constructor(
        private readonly logger: ILogger,
        private readonly connection: Connection
    ) {}

    /**
     * Get a MongoDB collection for direct access.
     *
     * @param name - Collection name
     * @returns MongoDB native collection
     * @throws Error if the name is empty or the connection is not established
     */
    public getCollection<T extends mongo.Document = mongo.Document>(name: string): mongo.Collection<T> {
        if (!name || !/^[A-Za-z0-9_-]+$/.test(name)) {
            throw new Error(`Invalid collection name: "${name}"`);
        }

        const db = this.connection.db;
        if (!db) {
            throw new Error('MongoDB connection not established');
        }
        return db.collection<T>(name);
    }

    /**
     * Atomically increment and return a named sequence.
     *
     * The first call for a sequence upserts its counter and returns 1.
     *
     * @param sequence - Sequence name
     * @returns The next value of the sequence
     */
    public async nextSequence(sequence: string): Promise<number> {
        const counters = this.getCollection<ICounterDocument>(COUNTERS_COLLECTION);
        const counter = await counters.findOneAndUpdate(
            { _id: sequence },
            { $inc: { seq: 1 } },
            { upsert: true, returnDocument: 'after' }
        );

        if (!counter) {
            throw new Error(`Sequence "${sequence}" could not be incremented`);
        }

        return counter.seq;
    }

    /**
     * Create an index on a collection. Existing identical indexes are left as is.
     *
     * @param collectionName - Collection to index
     * @param indexSpec - Index key specification
     * @param options - Index options (unique, partialFilterExpression, ...)
     */
    public async createIndex(
        collectionName: string,
        indexSpec: mongo.IndexSpecification,
        options: mongo.CreateIndexesOptions = {}
    ): Promise<void> {
        const name = await this.getCollection(collectionName).createIndex(indexSpec, options);
        this.logger.debug({ collection: collectionName, index: name }, 'Index ensured');
    }
}
