/**
 * Extension kinds.
 *
 * - `page` extensions render as a dashboard page and are reachable only through
 *   the path of the menu they are linked to.
 * - `widget` extensions are embedded inside other pages and referenced by their
 *   numeric id.
 */
export type ExtensionType = 'page' | 'widget';

/**
 * User-authored Vue single-file component stored by the platform.
 *
 * The source in `code` is recompiled on every save; `compiledCode` therefore
 * always corresponds to the current source. Extensions are toggled with
 * `isEnabled` rather than deleted, and a disabled extension never renders.
 */
export interface IExtension {
    /**
     * Numeric database identifier. Widgets are embedded by this id.
     */
    id: number;

    /**
     * Generated identifier (`extension_` + 12 hex characters). Also seeds the
     * scope id used for scoped styles.
     */
    extensionId: string;

    name: string;
    type: ExtensionType;
    description: string | null;

    /**
     * Semantic version string, `1.0.0` by default.
     */
    version: string;

    isEnabled: boolean;

    /**
     * System extensions ship with the platform and cannot be deleted.
     */
    isSystem: boolean;

    /**
     * SFC source as written by the user.
     */
    code: string;

    /**
     * Function body produced by the extension compiler.
     */
    compiledCode: string;

    /**
     * Id of the linked menu. Unique across extensions; only page extensions
     * may carry one.
     */
    menuId: number | null;

    createdBy: string | null;
    updatedBy: string | null;
    createdAt: Date;
    updatedAt: Date;
}

export interface IExtensionCreateInput {
    name: string;
    type?: ExtensionType;
    description?: string | null;
    version?: string;
    isEnabled?: boolean;
    isSystem?: boolean;
    code: string;
    menuId?: number | null;
}

/**
 * Partial update of an extension. `isSystem` and `extensionId` are fixed at creation.
 */
export type IExtensionUpdateInput = Partial<Omit<IExtensionCreateInput, 'isSystem'>>;

/**
 * Filters accepted by the extension listing.
 */
export interface IExtensionListFilter {
    type?: ExtensionType;
    isEnabled?: boolean;

    /**
     * Case-insensitive substring matched against name and description.
     */
    search?: string;

    limit?: number;
    skip?: number;
}

export interface IExtensionStats {
    total: number;
    enabled: number;
    pages: number;
    widgets: number;
}
