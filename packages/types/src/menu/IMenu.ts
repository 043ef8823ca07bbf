/**
 * Kind of menu entry.
 *
 * - `mini` entries are sidebar groups rendered in the narrow icon rail. They
 *   group `menu` entries and never belong to another group themselves.
 * - `menu` entries are navigation items. They may belong to one sidebar group
 *   and may be linked to a single Page extension.
 */
export type MenuType = 'mini' | 'menu';

/**
 * Admin-configured navigation entry.
 *
 * Menus are created and edited through the admin API and destroyed by deleting
 * them there. The one-to-one link to a Page extension is stored on the extension
 * side (`IExtension.menuId`), so a menu carries no extension reference itself.
 */
export interface IMenu {
    /**
     * Numeric database identifier, assigned from the `menu_definition` sequence.
     */
    id: number;

    type: MenuType;

    /**
     * Display label shown in the sidebar.
     */
    label: string;

    /**
     * Normalised route path, unique across all menus.
     * Always starts with a single slash and never ends with one (except `/`).
     */
    path: string;

    /**
     * Icon identifier understood by the dashboard (e.g. `lucide:layout-dashboard`).
     */
    icon: string;

    /**
     * Id of the `mini` entry this item is grouped under, or null when ungrouped.
     * Always null for `mini` entries.
     */
    sidebarId: number | null;

    /**
     * Sort order inside the sidebar group. Lower numbers come first.
     */
    order: number;

    /**
     * Disabled menus stay stored but resolve no page and are hidden by the host.
     */
    isEnabled: boolean;

    description: string | null;

    createdAt: Date;
    updatedAt: Date;
}

/**
 * Input accepted when creating a menu. Omitted fields take service defaults.
 */
export interface IMenuCreateInput {
    type?: MenuType;
    label: string;
    path: string;
    icon?: string;
    sidebarId?: number | null;
    order?: number;
    isEnabled?: boolean;
    description?: string | null;
}

/**
 * Partial update of a menu. Only provided fields change.
 */
export type IMenuUpdateInput = Partial<IMenuCreateInput>;
