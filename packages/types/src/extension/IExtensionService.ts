import type {
    IExtension,
    IExtensionCreateInput,
    IExtensionListFilter,
    IExtensionStats,
    IExtensionUpdateInput
} from './IExtension.js';
import type { IExtensionCompileResult } from './IExtensionCompiler.js';
import type { IResolvedExtension } from './IResolvedExtension.js';

/**
 * Extension management and resolution contract.
 *
 * Mutations take the acting user, recorded in the audit fields.
 */
export interface IExtensionService {
    create(input: IExtensionCreateInput, actor: string | null): Promise<IExtension>;
    update(id: number, patch: IExtensionUpdateInput, actor: string | null): Promise<IExtension>;
    setEnabled(id: number, enabled: boolean, actor: string | null): Promise<IExtension>;
    delete(id: number): Promise<void>;
    getById(id: number): Promise<IExtension | null>;
    getByExtensionId(extensionId: string): Promise<IExtension | null>;
    list(filter?: IExtensionListFilter): Promise<IExtension[]>;
    getStats(): Promise<IExtensionStats>;

    /**
     * Compile a source without saving anything.
     */
    compilePreview(code: string): IExtensionCompileResult;

    /**
     * Resolve the page extension reached through a dashboard path, or null when
     * nothing may render there.
     */
    resolvePage(path: string): Promise<IResolvedExtension | null>;

    /**
     * Resolve an embedded widget by numeric id, or null when it may not render.
     */
    resolveWidget(id: number): Promise<IResolvedExtension | null>;
}
