import type { IMenu } from './IMenu.js';

/**
 * Persistence contract for menus.
 *
 * The production implementation stores documents in the `menu_definition`
 * collection; tests substitute an in-memory implementation.
 */
export interface IMenuRepository {
    /**
     * Reserve the next numeric menu id.
     */
    nextId(): Promise<number>;

    findAll(): Promise<IMenu[]>;
    findById(id: number): Promise<IMenu | null>;
    insert(menu: IMenu): Promise<void>;

    /**
     * Replace the stored menu with the given record.
     *
     * @returns False when no menu with that id exists
     */
    replace(menu: IMenu): Promise<boolean>;

    /**
     * @returns False when no menu with that id existed
     */
    delete(id: number): Promise<boolean>;
}
