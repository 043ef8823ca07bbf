import type { ExtensionType } from './IExtension.js';

/**
 * Payload the dashboard runtime receives for an extension that may render.
 *
 * Only enabled extensions are ever resolved. Page payloads carry the menu they
 * were reached through; widget payloads do not.
 */
export interface IResolvedExtension {
    id: number;
    extensionId: string;
    name: string;
    type: ExtensionType;
    version: string;
    compiledCode: string;

    /**
     * ISO timestamp of the last save. Runtimes key their component cache on it.
     */
    updatedAt: string;

    menu?: {
        id: number;
        path: string;
        label: string;
    };
}
