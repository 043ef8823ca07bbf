import type { ExtensionType } from '@enfyra/types';

/**
 * MongoDB document stored in the `extension_definition` collection.
 *
 * `_id` holds the numeric extension id. `menuId` carries a partial unique
 * index so at most one extension links to a given menu.
 */
export interface IExtensionDocument {
    _id: number;
    extensionId: string;
    name: string;
    type: ExtensionType;
    description: string | null;
    version: string;
    isEnabled: boolean;
    isSystem: boolean;
    code: string;
    compiledCode: string;
    menuId: number | null;
    createdBy: string | null;
    updatedBy: string | null;
    createdAt: Date;
    updatedAt: Date;
}
