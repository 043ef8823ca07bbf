import type { mongo } from 'mongoose';
import type {
    IDatabaseService,
    IExtension,
    IExtensionListFilter,
    IExtensionRepository,
    IExtensionStats
} from '@enfyra/types';
import { ConflictError, duplicateKeyFields } from '../../../lib/errors.js';
import type { IExtensionDocument } from '../database/index.js';

export const EXTENSION_COLLECTION = 'extension_definition';

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function toExtension(doc: IExtensionDocument): IExtension {
    return {
        id: doc._id,
        extensionId: doc.extensionId,
        name: doc.name,
        type: doc.type,
        description: doc.description,
        version: doc.version,
        isEnabled: doc.isEnabled,
        isSystem: doc.isSystem,
        code: doc.code,
        compiledCode: doc.compiledCode,
        menuId: doc.menuId,
        createdBy: doc.createdBy,
        updatedBy: doc.updatedBy,
        createdAt: doc.createdAt,
        updatedAt: doc.updatedAt
    };
}

function toFields(extension: IExtension): Omit<IExtensionDocument, '_id'> {
    return {
        extensionId: extension.extensionId,
        name: extension.name,
        type: extension.type,
        description: extension.description,
        version: extension.version,
        isEnabled: extension.isEnabled,
        isSystem: extension.isSystem,
        code: extension.code,
        compiledCode: extension.compiledCode,
        menuId: extension.menuId,
        createdBy: extension.createdBy,
        updatedBy: extension.updatedBy,
        createdAt: extension.createdAt,
        updatedAt: extension.updatedAt
    };
}

/**
 * Map a unique index violation to 409. Link checks in `ExtensionService` run
 * before the write, so two concurrent saves can both pass them.
 */
function toConflict(error: unknown, extension: IExtension): unknown {
    const fields = duplicateKeyFields(error);
    if (fields === null) {
        return error;
    }
    if (fields.includes('menuId')) {
        return new ConflictError(`Menu ${extension.menuId} is already linked to another extension`, { fields });
    }
    if (fields.includes('extensionId')) {
        return new ConflictError(`Extension id ${extension.extensionId} is already taken`, { fields });
    }
    return new ConflictError(`Extension ${extension.id} already exists`, { fields });
}

/**
 * MongoDB implementation of {@link IExtensionRepository}.
 */
export class ExtensionRepository implements IExtensionRepository {
    constructor(private readonly database: IDatabaseService) {}

    private get collection() {
        return this.database.getCollection<IExtensionDocument>(EXTENSION_COLLECTION);
    }

    /**
     * Unique extensionId, partial unique menuId (only numeric values take part,
     * so any number of extensions can be unlinked), and a type/enabled index
     * for listing.
     */
    async ensureIndexes(): Promise<void> {
        await this.database.createIndex(
            EXTENSION_COLLECTION,
            { extensionId: 1 },
            { unique: true, name: 'extension_extension_id_unique' }
        );
        await this.database.createIndex(
            EXTENSION_COLLECTION,
            { menuId: 1 },
            { unique: true, partialFilterExpression: { menuId: { $type: 'number' } }, name: 'extension_menu_id_unique' }
        );
        await this.database.createIndex(
            EXTENSION_COLLECTION,
            { type: 1, isEnabled: 1 },
            { name: 'extension_type_enabled' }
        );
    }

    nextId(): Promise<number> {
        return this.database.nextSequence(EXTENSION_COLLECTION);
    }

    async findById(id: number): Promise<IExtension | null> {
        const doc = await this.collection.findOne({ _id: id });
        return doc ? toExtension(doc) : null;
    }

    async findByExtensionId(extensionId: string): Promise<IExtension | null> {
        const doc = await this.collection.findOne({ extensionId });
        return doc ? toExtension(doc) : null;
    }

    async findByMenuId(menuId: number): Promise<IExtension | null> {
        const doc = await this.collection.findOne({ menuId });
        return doc ? toExtension(doc) : null;
    }

    async find(filter: IExtensionListFilter): Promise<IExtension[]> {
        const query: mongo.Filter<IExtensionDocument> = {};
        if (filter.type !== undefined) {
            query.type = filter.type;
        }
        if (filter.isEnabled !== undefined) {
            query.isEnabled = filter.isEnabled;
        }
        if (filter.search) {
            const pattern = new RegExp(escapeRegExp(filter.search), 'i');
            query.$or = [{ name: pattern }, { description: pattern }];
        }

        let cursor = this.collection.find(query).sort({ _id: 1 }).skip(filter.skip ?? 0);
        if (filter.limit !== undefined) {
            cursor = cursor.limit(filter.limit);
        }
        const docs = await cursor.toArray();
        return docs.map(toExtension);
    }

    async stats(): Promise<IExtensionStats> {
        const [total, enabled, pages, widgets] = await Promise.all([
            this.collection.countDocuments({}),
            this.collection.countDocuments({ isEnabled: true }),
            this.collection.countDocuments({ type: 'page' }),
            this.collection.countDocuments({ type: 'widget' })
        ]);
        return { total, enabled, pages, widgets };
    }

    /**
     * @throws ConflictError when a concurrent write took the menu link or id
     */
    async insert(extension: IExtension): Promise<void> {
        try {
            await this.collection.insertOne({ _id: extension.id, ...toFields(extension) });
        } catch (error) {
            throw toConflict(error, extension);
        }
    }

    /**
     * @throws ConflictError when a concurrent write took the menu link
     */
    async replace(extension: IExtension): Promise<boolean> {
        try {
            const result = await this.collection.replaceOne({ _id: extension.id }, toFields(extension));
            return result.matchedCount > 0;
        } catch (error) {
            throw toConflict(error, extension);
        }
    }

    async delete(id: number): Promise<boolean> {
        const result = await this.collection.deleteOne({ _id: id });
        return result.deletedCount > 0;
    }
}
