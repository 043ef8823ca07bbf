import type { IExtension, IExtensionListFilter, IExtensionStats } from './IExtension.js';

/**
 * Persistence contract for extensions.
 *
 * The production implementation stores documents in the `extension_definition`
 * collection; tests substitute an in-memory implementation.
 */
export interface IExtensionRepository {
    nextId(): Promise<number>;
    findById(id: number): Promise<IExtension | null>;
    findByExtensionId(extensionId: string): Promise<IExtension | null>;
    findByMenuId(menuId: number): Promise<IExtension | null>;

    /**
     * Results are sorted by id ascending.
     */
    find(filter: IExtensionListFilter): Promise<IExtension[]>;

    stats(): Promise<IExtensionStats>;
    insert(extension: IExtension): Promise<void>;

    /**
     * @returns False when no extension with that id exists
     */
    replace(extension: IExtension): Promise<boolean>;

    delete(id: number): Promise<boolean>;
}
