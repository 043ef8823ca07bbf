import type { IMenu, IMenuCreateInput, IMenuUpdateInput } from './IMenu.js';
import type { IMenuTree } from './IMenuTree.js';
import type { MenuEventType, MenuEventSubscriber } from './IMenuEvent.js';

/**
 * Menu management contract used by controllers and other modules.
 */
export interface IMenuService {
    initialize(): Promise<void>;
    subscribe(eventType: MenuEventType, subscriber: MenuEventSubscriber): void;
    create(input: IMenuCreateInput): Promise<IMenu>;
    update(id: number, patch: IMenuUpdateInput): Promise<IMenu>;
    delete(id: number): Promise<void>;
    getById(id: number): IMenu | null;

    /**
     * Look up a menu by path. The path is normalised before comparison.
     */
    getByPath(path: string): IMenu | null;

    list(): IMenu[];
    getTree(): IMenuTree;
}
