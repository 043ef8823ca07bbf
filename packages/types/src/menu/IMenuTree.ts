import type { IMenu } from './IMenu.js';

/**
 * Sidebar group with the menu items grouped under it.
 */
export interface IMenuSidebar extends IMenu {
    /**
     * Items whose `sidebarId` points at this group, sorted by order then id.
     */
    items: IMenu[];
}

/**
 * Navigation structure served to the dashboard.
 */
export interface IMenuTree {
    /**
     * All `mini` entries sorted by order then id, each with its items.
     */
    sidebars: IMenuSidebar[];

    /**
     * `menu` entries that belong to no sidebar group.
     */
    ungrouped: IMenu[];

    generatedAt: Date;
}
