import type { MenuType } from '@enfyra/types';

/**
 * MongoDB document stored in the `menu_definition` collection.
 *
 * The numeric menu id is stored as `_id`; {@link MenuRepository} maps it to
 * `IMenu.id` so callers never see driver field names.
 */
export interface IMenuDocument {
    _id: number;
    type: MenuType;
    label: string;
    path: string;
    icon: string;
    sidebarId: number | null;
    order: number;
    isEnabled: boolean;
    description: string | null;
    createdAt: Date;
    updatedAt: Date;
}
