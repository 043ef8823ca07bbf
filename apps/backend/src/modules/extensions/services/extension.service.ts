import { randomBytes } from 'node:crypto';
import type {
    ExtensionType,
    ICacheService,
    IExtension,
    IExtensionCompileResult,
    IExtensionCompiler,
    IExtensionCreateInput,
    IExtensionListFilter,
    IExtensionRepository,
    IExtensionService,
    IExtensionStats,
    IExtensionUpdateInput,
    ILogger,
    IMenu,
    IMenuEvent,
    IMenuService,
    IResolvedExtension
} from '@enfyra/types';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from '../../../lib/errors.js';

export const DEFAULT_EXTENSION_VERSION = '1.0.0';
export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 200;
export const MAX_NAME_LENGTH = 100;

/**
 * Cache key prefix for resolved payloads.
 * Widgets: "extension:resolved:{id}", pages: "extension:resolved:page:{path}".
 */
export const RESOLVED_CACHE_PREFIX = 'extension:resolved:';

/**
 * Extension id used when compiling a preview that is never stored.
 */
export const PREVIEW_EXTENSION_ID = 'extension_preview';

const VERSION_PATTERN = /^\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?$/;
const SYSTEM_ACTOR = 'system';

export interface IExtensionServiceOptions {
    /**
     * Lifetime of cached runtime payloads in seconds.
     */
    cacheTtlSeconds: number;
}

export function widgetCacheKey(id: number): string {
    return `${RESOLVED_CACHE_PREFIX}${id}`;
}

export function pageCacheKey(path: string): string {
    return `${RESOLVED_CACHE_PREFIX}page:${path}`;
}

/**
 * Generate a public extension identifier: `extension_` followed by 12 hex characters.
 */
export function generateExtensionId(): string {
    return `extension_${randomBytes(6).toString('hex')}`;
}

/**
 * Service managing extension records and resolving what the runtime may render.
 *
 * Every save recompiles the SFC source, so `compiledCode` always matches
 * `code`; a source that does not compile rejects the save. The one-to-one
 * menu link lives on the extension (`menuId`) and only page extensions may
 * carry it.
 *
 * Rendering rules:
 * - Page extensions are resolved only through their linked menu's path, and
 *   only while both the menu and the extension are enabled
 * - Widget extensions are resolved by numeric id while enabled
 * - Disabled extensions never resolve
 *
 * Resolved payloads are cached in Redis and invalidated on every change to the
 * extension or its menu.
 */
export class ExtensionService implements IExtensionService {
    constructor(
        private readonly repository: IExtensionRepository,
        private readonly menuService: IMenuService,
        private readonly compiler: IExtensionCompiler,
        private readonly cacheService: ICacheService,
        private readonly logger: ILogger,
        private readonly options: IExtensionServiceOptions
    ) {}

    /**
     * Subscribe to menu events so menu changes reach the extensions that are
     * linked to them. Deleting a menu unlinks its extension but keeps it; a
     * linked menu cannot become a sidebar group.
     */
    attachMenuEvents(): void {
        this.menuService.subscribe('before:update', event => this.vetoLinkedSidebar(event));
        this.menuService.subscribe('after:update', event => this.handleMenuUpdated(event));
        this.menuService.subscribe('after:delete', event => this.handleMenuDeleted(event));
    }

    /**
     * Create an extension.
     *
     * @throws ValidationError for an invalid name, version or link
     * @throws ConflictError when the menu is already linked to another extension
     * @throws CompileError when the source does not compile
     */
    async create(input: IExtensionCreateInput, actor: string | null): Promise<IExtension> {
        const name = this.requireName(input.name);
        const version = this.requireVersion(input.version ?? DEFAULT_EXTENSION_VERSION);
        const type: ExtensionType = input.type ?? 'page';
        const menuId = input.menuId ?? null;

        await this.checkLink(type, menuId, null);

        const extensionId = await this.uniqueExtensionId();
        const compiled = this.compiler.compile(input.code, extensionId);

        const now = new Date();
        const extension: IExtension = {
            id: await this.repository.nextId(),
            extensionId,
            name,
            type,
            description: input.description ?? null,
            version,
            isEnabled: input.isEnabled ?? true,
            isSystem: input.isSystem ?? false,
            code: input.code,
            compiledCode: compiled.code,
            menuId,
            createdBy: actor,
            updatedBy: actor,
            createdAt: now,
            updatedAt: now
        };

        await this.repository.insert(extension);
        await this.invalidate(extension);

        this.logger.info({ id: extension.id, extensionId, type, menuId }, 'Extension created');
        return extension;
    }

    /**
     * Apply a partial update and recompile the merged source, even when `code`
     * was not part of the patch.
     *
     * @throws NotFoundError when no extension has this id
     */
    async update(id: number, patch: IExtensionUpdateInput, actor: string | null): Promise<IExtension> {
        const existing = await this.requireExtension(id);

        const merged: IExtension = {
            ...existing,
            name: patch.name !== undefined ? this.requireName(patch.name) : existing.name,
            type: patch.type ?? existing.type,
            description: patch.description !== undefined ? patch.description : existing.description,
            version: patch.version !== undefined ? this.requireVersion(patch.version) : existing.version,
            isEnabled: patch.isEnabled ?? existing.isEnabled,
            code: patch.code ?? existing.code,
            menuId: patch.menuId !== undefined ? patch.menuId : existing.menuId,
            updatedBy: actor,
            updatedAt: new Date()
        };

        if (existing.menuId !== null && merged.menuId !== null && merged.type !== 'page') {
            throw new ValidationError('A linked extension must stay a page; unlink it from its menu first');
        }
        await this.checkLink(merged.type, merged.menuId, id);

        merged.compiledCode = this.compiler.compile(merged.code, existing.extensionId).code;

        await this.save(merged);
        await this.invalidate(existing);
        await this.invalidate(merged);

        this.logger.info({ id, extensionId: existing.extensionId, menuId: merged.menuId }, 'Extension updated');
        return merged;
    }

    /**
     * Enable or disable an extension. The source is not recompiled.
     */
    async setEnabled(id: number, enabled: boolean, actor: string | null): Promise<IExtension> {
        const existing = await this.requireExtension(id);
        const updated: IExtension = { ...existing, isEnabled: enabled, updatedBy: actor, updatedAt: new Date() };

        await this.save(updated);
        await this.invalidate(updated);

        this.logger.info({ id, isEnabled: enabled }, enabled ? 'Extension enabled' : 'Extension disabled');
        return updated;
    }

    /**
     * @throws ForbiddenError for system extensions
     */
    async delete(id: number): Promise<void> {
        const existing = await this.requireExtension(id);
        if (existing.isSystem) {
            throw new ForbiddenError(`System extension "${existing.name}" cannot be deleted`);
        }

        await this.repository.delete(id);
        await this.invalidate(existing);

        this.logger.info({ id, extensionId: existing.extensionId }, 'Extension deleted');
    }

    getById(id: number): Promise<IExtension | null> {
        return this.repository.findById(id);
    }

    getByExtensionId(extensionId: string): Promise<IExtension | null> {
        return this.repository.findByExtensionId(extensionId);
    }

    /**
     * List extensions sorted by id. `limit` defaults to 50 and is capped at 200.
     */
    list(filter: IExtensionListFilter = {}): Promise<IExtension[]> {
        const limit = Math.min(Math.max(Math.trunc(filter.limit ?? DEFAULT_LIST_LIMIT), 1), MAX_LIST_LIMIT);
        const skip = Math.max(Math.trunc(filter.skip ?? 0), 0);
        const search = filter.search?.trim() || undefined;

        return this.repository.find({ type: filter.type, isEnabled: filter.isEnabled, search, limit, skip });
    }

    getStats(): Promise<IExtensionStats> {
        return this.repository.stats();
    }

    /**
     * @throws CompileError when the source does not compile
     */
    compilePreview(code: string): IExtensionCompileResult {
        return this.compiler.compile(code, PREVIEW_EXTENSION_ID);
    }

    /**
     * Resolve the page extension for a dashboard path.
     *
     * @returns Null unless the path names an enabled menu linked to an enabled page extension
     */
    async resolvePage(path: string): Promise<IResolvedExtension | null> {
        const menu = this.menuService.getByPath(path);
        if (!menu || !menu.isEnabled) {
            return null;
        }

        const key = pageCacheKey(menu.path);
        const cached = await this.readCache(key);
        if (cached) {
            return cached;
        }

        const extension = await this.repository.findByMenuId(menu.id);
        if (!extension || extension.type !== 'page' || !extension.isEnabled) {
            return null;
        }

        const resolved = this.toResolved(extension, menu);
        await this.writeCache(key, resolved);
        return resolved;
    }

    /**
     * Resolve an embeddable widget by id.
     *
     * @returns Null unless the id names an enabled widget extension
     */
    async resolveWidget(id: number): Promise<IResolvedExtension | null> {
        const key = widgetCacheKey(id);
        const cached = await this.readCache(key);
        if (cached) {
            return cached;
        }

        const extension = await this.repository.findById(id);
        if (!extension || extension.type !== 'widget' || !extension.isEnabled) {
            return null;
        }

        const resolved = this.toResolved(extension);
        await this.writeCache(key, resolved);
        return resolved;
    }

    private async requireExtension(id: number): Promise<IExtension> {
        const extension = await this.repository.findById(id);
        if (!extension) {
            throw new NotFoundError(`Extension not found: ${id}`);
        }
        return extension;
    }

    private requireName(raw: string): string {
        const name = raw.trim();
        if (!name || name.length > MAX_NAME_LENGTH) {
            throw new ValidationError(`Extension name must be 1-${MAX_NAME_LENGTH} characters`);
        }
        return name;
    }

    private requireVersion(version: string): string {
        if (!VERSION_PATTERN.test(version)) {
            throw new ValidationError(`Invalid version "${version}": expected MAJOR.MINOR.PATCH`);
        }
        return version;
    }

    /**
     * Check that `menuId` may be linked to an extension of `type`.
     *
     * @param selfId - Id of the extension being updated, or null on create
     */
    private async checkLink(type: ExtensionType, menuId: number | null, selfId: number | null): Promise<void> {
        if (menuId === null) {
            return;
        }
        if (type !== 'page') {
            throw new ValidationError('Only page extensions can be linked to a menu');
        }

        const menu = this.menuService.getById(menuId);
        if (!menu) {
            throw new ValidationError(`Menu ${menuId} does not exist`);
        }
        if (menu.type !== 'menu') {
            throw new ValidationError('Sidebar groups cannot be linked to an extension');
        }

        const linked = await this.repository.findByMenuId(menuId);
        if (linked && linked.id !== selfId) {
            throw new ConflictError(`Menu ${menuId} is already linked to extension "${linked.name}"`);
        }
    }

    private async uniqueExtensionId(): Promise<string> {
        for (let attempt = 0; attempt < 5; attempt++) {
            const candidate = generateExtensionId();
            if (!(await this.repository.findByExtensionId(candidate))) {
                return candidate;
            }
        }
        throw new ConflictError('Could not allocate a unique extension id');
    }

    private async save(extension: IExtension): Promise<void> {
        const replaced = await this.repository.replace(extension);
        if (!replaced) {
            throw new NotFoundError(`Extension not found: ${extension.id}`);
        }
    }

    private toResolved(extension: IExtension, menu?: IMenu): IResolvedExtension {
        return {
            id: extension.id,
            extensionId: extension.extensionId,
            name: extension.name,
            type: extension.type,
            version: extension.version,
            compiledCode: extension.compiledCode,
            updatedAt: extension.updatedAt.toISOString(),
            ...(menu && { menu: { id: menu.id, path: menu.path, label: menu.label } })
        };
    }

    private async readCache(key: string): Promise<IResolvedExtension | null> {
        try {
            return await this.cacheService.get<IResolvedExtension>(key);
        } catch (error) {
            this.logger.warn({ key, error }, 'Resolved extension cache read failed, falling back to database');
            return null;
        }
    }

    private async writeCache(key: string, value: IResolvedExtension): Promise<void> {
        try {
            await this.cacheService.set(key, value, this.options.cacheTtlSeconds);
        } catch (error) {
            this.logger.warn({ key, error }, 'Resolved extension cache write failed');
        }
    }

    /**
     * Drop the cached payloads an extension may be served from: its widget key
     * and the page key of its linked menu, plus any extra menu paths given.
     */
    private async invalidate(extension: IExtension, menuPaths: string[] = []): Promise<void> {
        const keys = new Set([widgetCacheKey(extension.id)]);
        const menu = extension.menuId !== null ? this.menuService.getById(extension.menuId) : null;
        if (menu) {
            keys.add(pageCacheKey(menu.path));
        }
        for (const path of menuPaths) {
            keys.add(pageCacheKey(path));
        }

        for (const key of keys) {
            try {
                await this.cacheService.del(key);
            } catch (error) {
                this.logger.error({ key, error }, 'Failed to invalidate resolved extension cache');
            }
        }
    }

    private async vetoLinkedSidebar(event: IMenuEvent): Promise<void> {
        if (event.menu.type !== 'mini' || event.previous?.type === 'mini') {
            return;
        }
        const linked = await this.repository.findByMenuId(event.menu.id);
        if (linked) {
            event.validation.continue = false;
            event.validation.error = `Menu ${event.menu.id} is linked to extension "${linked.name}"; unlink it before turning it into a sidebar group`;
        }
    }

    private async handleMenuUpdated(event: IMenuEvent): Promise<void> {
        await this.cacheService.del(pageCacheKey(event.menu.path));
        if (event.previous && event.previous.path !== event.menu.path) {
            await this.cacheService.del(pageCacheKey(event.previous.path));
        }
    }

    private async handleMenuDeleted(event: IMenuEvent): Promise<void> {
        const linked = await this.repository.findByMenuId(event.menu.id);
        if (!linked) {
            await this.cacheService.del(pageCacheKey(event.menu.path));
            return;
        }

        const unlinked: IExtension = { ...linked, menuId: null, updatedBy: SYSTEM_ACTOR, updatedAt: new Date() };
        await this.save(unlinked);
        await this.invalidate(unlinked, [event.menu.path]);

        this.logger.info({ id: linked.id, menuId: event.menu.id }, 'Extension unlinked from deleted menu');
    }
}
