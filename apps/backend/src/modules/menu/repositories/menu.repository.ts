import type { IDatabaseService, IMenu, IMenuRepository } from '@enfyra/types';
import { ConflictError, duplicateKeyFields } from '../../../lib/errors.js';
import type { IMenuDocument } from '../database/index.js';

export const MENU_COLLECTION = 'menu_definition';

function toMenu(doc: IMenuDocument): IMenu {
    return {
        id: doc._id,
        type: doc.type,
        label: doc.label,
        path: doc.path,
        icon: doc.icon,
        sidebarId: doc.sidebarId,
        order: doc.order,
        isEnabled: doc.isEnabled,
        description: doc.description,
        createdAt: doc.createdAt,
        updatedAt: doc.updatedAt
    };
}

function toFields(menu: IMenu): Omit<IMenuDocument, '_id'> {
    return {
        type: menu.type,
        label: menu.label,
        path: menu.path,
        icon: menu.icon,
        sidebarId: menu.sidebarId,
        order: menu.order,
        isEnabled: menu.isEnabled,
        description: menu.description,
        createdAt: menu.createdAt,
        updatedAt: menu.updatedAt
    };
}

/**
 * Unique index violations surface as 409. The in-memory check in
 * `MenuService` runs before an await, so concurrent writes can both pass it.
 */
function toConflict(error: unknown, menu: IMenu): unknown {
    const fields = duplicateKeyFields(error);
    if (fields === null) {
        return error;
    }
    const message = fields.includes('_id')
        ? `Menu ${menu.id} already exists`
        : `A menu with path "${menu.path}" already exists`;
    return new ConflictError(message, { fields });
}

/**
 * MongoDB implementation of {@link IMenuRepository}.
 */
export class MenuRepository implements IMenuRepository {
    constructor(private readonly database: IDatabaseService) {}

    private get collection() {
        return this.database.getCollection<IMenuDocument>(MENU_COLLECTION);
    }

    /**
     * Create the unique path index and the sidebar ordering index.
     */
    async ensureIndexes(): Promise<void> {
        await this.database.createIndex(MENU_COLLECTION, { path: 1 }, { unique: true, name: 'menu_path_unique' });
        await this.database.createIndex(MENU_COLLECTION, { sidebarId: 1, order: 1 }, { name: 'menu_sidebar_order' });
    }

    nextId(): Promise<number> {
        return this.database.nextSequence(MENU_COLLECTION);
    }

    async findAll(): Promise<IMenu[]> {
        const docs = await this.collection.find({}).sort({ _id: 1 }).toArray();
        return docs.map(toMenu);
    }

    async findById(id: number): Promise<IMenu | null> {
        const doc = await this.collection.findOne({ _id: id });
        return doc ? toMenu(doc) : null;
    }

    /**
     * @throws ConflictError when another menu took the path first
     */
    async insert(menu: IMenu): Promise<void> {
        try {
            await this.collection.insertOne({ _id: menu.id, ...toFields(menu) });
        } catch (error) {
            throw toConflict(error, menu);
        }
    }

    /**
     * @throws ConflictError when another menu took the path first
     */
    async replace(menu: IMenu): Promise<boolean> {
        try {
            const result = await this.collection.replaceOne({ _id: menu.id }, toFields(menu));
            return result.matchedCount > 0;
        } catch (error) {
            throw toConflict(error, menu);
        }
    }

    async delete(id: number): Promise<boolean> {
        const result = await this.collection.deleteOne({ _id: id });
        return result.deletedCount > 0;
    }
}
