import type { IResolvedExtension } from '@enfyra/types';
import type { IExtensionSource } from './extension-client.js';
import { instantiateExtension, type IExtensionComponent, type IExtensionScope } from './instantiate.js';

export interface ILoadedExtension {
    extension: IResolvedExtension;
    component: IExtensionComponent;
}

export interface IExtensionLoaderOptions extends IExtensionScope {
    source: IExtensionSource;

    /**
     * Called with a component's compiled CSS the first time a build is
     * instantiated. Hosts typically append a `<style>` element.
     */
    injectStyles?: (css: string, extension: IResolvedExtension) => void;
}

/**
 * Fetches resolved extensions and caches their components per build.
 *
 * A build is identified by extension id and `updatedAt`; saving an extension
 * changes `updatedAt`, so the next load instantiates the new code and drops
 * the previous build of that extension.
 */
export class ExtensionLoader {
    private readonly builds = new Map<number, { updatedAt: string; component: IExtensionComponent }>();

    constructor(private readonly options: IExtensionLoaderOptions) {}

    async loadPage(path: string): Promise<ILoadedExtension | null> {
        const extension = await this.options.source.fetchPage(path);
        return extension ? this.load(extension) : null;
    }

    async loadWidget(id: number): Promise<ILoadedExtension | null> {
        const extension = await this.options.source.fetchWidget(id);
        return extension ? this.load(extension) : null;
    }

    clear(): void {
        this.builds.clear();
    }

    get size(): number {
        return this.builds.size;
    }

    private load(extension: IResolvedExtension): ILoadedExtension {
        const cached = this.builds.get(extension.id);
        if (cached && cached.updatedAt === extension.updatedAt) {
            return { extension, component: cached.component };
        }

        const component = instantiateExtension(extension.compiledCode, this.options, extension.extensionId);
        this.builds.set(extension.id, { updatedAt: extension.updatedAt, component });

        if (component.__css && this.options.injectStyles) {
            this.options.injectStyles(component.__css, extension);
        }
        return { extension, component };
    }
}
