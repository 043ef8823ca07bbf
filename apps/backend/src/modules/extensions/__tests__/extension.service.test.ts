/// <reference types="vitest" />

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { IExtensionCompileResult, IExtensionCompiler } from '@enfyra/types';
import { ExtensionService, pageCacheKey, widgetCacheKey } from '../services/extension.service.js';
import { MenuService } from '../../menu/menu.service.js';
import { CompileError, ConflictError, ForbiddenError, NotFoundError, ValidationError } from '../../../lib/errors.js';
import { InMemoryMenuRepository } from '../../../tests/vitest/mocks/menu-repository.js';
import { InMemoryExtensionRepository, buildExtension } from '../../../tests/vitest/mocks/extension-repository.js';
import { InMemoryCacheService } from '../../../tests/vitest/mocks/cache-service.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';

const PAGE_SOURCE = '<template><div>page</div></template>';
const WIDGET_SOURCE = '<template><span>widget</span></template>';

/**
 * Compiler double: prefixes the source with the extension id and fails on
 * sources containing "BROKEN".
 */
class FakeCompiler implements IExtensionCompiler {
    compile = vi.fn((source: string, extensionId: string): IExtensionCompileResult => {
        if (source.includes('BROKEN')) {
            throw new CompileError([{ block: 'template', message: 'broken template' }]);
        }
        return { code: `// ${extensionId}\n${source}\nreturn __sfc__;`, css: '', imports: [] };
    });
}

describe('ExtensionService', () => {
    let menuService: MenuService;
    let repository: InMemoryExtensionRepository;
    let compiler: FakeCompiler;
    let cache: InMemoryCacheService;
    let service: ExtensionService;

    beforeEach(async () => {
        menuService = new MenuService(new InMemoryMenuRepository(), createMockLogger());
        await menuService.initialize();
        repository = new InMemoryExtensionRepository();
        compiler = new FakeCompiler();
        cache = new InMemoryCacheService();
        service = new ExtensionService(repository, menuService, compiler, cache, createMockLogger(), {
            cacheTtlSeconds: 300
        });
        service.attachMenuEvents();
    });

    describe('create', () => {
        it('should apply defaults, compile and record the actor', async () => {
            const extension = await service.create({ name: '  Sales report ', code: PAGE_SOURCE }, 'alice');

            expect(extension).toMatchObject({
                id: 1,
                name: 'Sales report',
                type: 'page',
                description: null,
                version: '1.0.0',
                isEnabled: true,
                isSystem: false,
                code: PAGE_SOURCE,
                menuId: null,
                createdBy: 'alice',
                updatedBy: 'alice'
            });
            expect(extension.extensionId).toMatch(/^extension_[0-9a-f]{12}$/);
            expect(extension.compiledCode).toBe(`// ${extension.extensionId}\n${PAGE_SOURCE}\nreturn __sfc__;`);
            expect(compiler.compile).toHaveBeenCalledWith(PAGE_SOURCE, extension.extensionId);
            expect(repository.snapshot()).toHaveLength(1);
        });

        it('should reject sources that do not compile without persisting', async () => {
            await expect(service.create({ name: 'Broken', code: 'BROKEN' }, 'alice')).rejects.toThrow(CompileError);
            expect(repository.snapshot()).toEqual([]);
        });

        it('should validate name and version', async () => {
            await expect(service.create({ name: '   ', code: PAGE_SOURCE }, null)).rejects.toThrow(
                'Extension name must be 1-100 characters'
            );
            await expect(service.create({ name: 'x'.repeat(101), code: PAGE_SOURCE }, null)).rejects.toThrow(
                ValidationError
            );
            await expect(service.create({ name: 'A', code: PAGE_SOURCE, version: '1.0' }, null)).rejects.toThrow(
                'Invalid version "1.0": expected MAJOR.MINOR.PATCH'
            );
        });

        it('should accept pre-release and build versions', async () => {
            const beta = await service.create({ name: 'A', code: PAGE_SOURCE, version: '2.0.0-beta.1' }, null);
            const build = await service.create({ name: 'B', code: PAGE_SOURCE, version: '1.2.3+build.7' }, null);

            expect(beta.version).toBe('2.0.0-beta.1');
            expect(build.version).toBe('1.2.3+build.7');
        });

        it('should link a page extension to a menu', async () => {
            const menu = await menuService.create({ label: 'Reports', path: '/reports' });

            const extension = await service.create({ name: 'Reports', code: PAGE_SOURCE, menuId: menu.id }, 'alice');

            expect(extension.menuId).toBe(menu.id);
        });

        it('should refuse to link a widget', async () => {
            const menu = await menuService.create({ label: 'Reports', path: '/reports' });

            await expect(
                service.create({ name: 'W', type: 'widget', code: WIDGET_SOURCE, menuId: menu.id }, null)
            ).rejects.toThrow('Only page extensions can be linked to a menu');
        });

        it('should refuse unknown menus and sidebar groups', async () => {
            const sidebar = await menuService.create({ type: 'mini', label: 'Tools', path: '/tools' });

            await expect(service.create({ name: 'P', code: PAGE_SOURCE, menuId: 99 }, null)).rejects.toThrow(
                'Menu 99 does not exist'
            );
            await expect(service.create({ name: 'P', code: PAGE_SOURCE, menuId: sidebar.id }, null)).rejects.toThrow(
                'Sidebar groups cannot be linked to an extension'
            );
        });

        it('should keep the menu link one-to-one', async () => {
            const menu = await menuService.create({ label: 'Reports', path: '/reports' });
            await service.create({ name: 'First', code: PAGE_SOURCE, menuId: menu.id }, null);

            await expect(service.create({ name: 'Second', code: PAGE_SOURCE, menuId: menu.id }, null)).rejects.toThrow(
                ConflictError
            );
            await expect(service.create({ name: 'Second', code: PAGE_SOURCE, menuId: menu.id }, null)).rejects.toThrow(
                `Menu ${menu.id} is already linked to extension "First"`
            );
        });
    });

    describe('update', () => {
        it('should recompile on every save even when the code is unchanged', async () => {
            const extension = await service.create({ name: 'Page', code: PAGE_SOURCE }, 'alice');
            compiler.compile.mockClear();

            const updated = await service.update(extension.id, { description: 'Monthly numbers' }, 'bob');

            expect(compiler.compile).toHaveBeenCalledTimes(1);
            expect(compiler.compile).toHaveBeenCalledWith(PAGE_SOURCE, extension.extensionId);
            expect(updated).toMatchObject({
                description: 'Monthly numbers',
                createdBy: 'alice',
                updatedBy: 'bob',
                extensionId: extension.extensionId
            });
        });

        it('should keep the stored record when the new source fails to compile', async () => {
            const extension = await service.create({ name: 'Page', code: PAGE_SOURCE }, null);

            await expect(service.update(extension.id, { code: 'BROKEN' }, null)).rejects.toThrow(CompileError);
            expect((await service.getById(extension.id))?.code).toBe(PAGE_SOURCE);
        });

        it('should refuse to turn a linked page into a widget', async () => {
            const menu = await menuService.create({ label: 'Reports', path: '/reports' });
            const extension = await service.create({ name: 'Page', code: PAGE_SOURCE, menuId: menu.id }, null);

            await expect(service.update(extension.id, { type: 'widget' }, null)).rejects.toThrow(
                'A linked extension must stay a page; unlink it from its menu first'
            );
        });

        it('should allow turning a page into a widget while unlinking it', async () => {
            const menu = await menuService.create({ label: 'Reports', path: '/reports' });
            const extension = await service.create({ name: 'Page', code: PAGE_SOURCE, menuId: menu.id }, null);

            const updated = await service.update(extension.id, { type: 'widget', menuId: null }, null);

            expect(updated.type).toBe('widget');
            expect(updated.menuId).toBeNull();
        });

        it('should move a link to another menu and free the old one', async () => {
            const first = await menuService.create({ label: 'First', path: '/first' });
            const second = await menuService.create({ label: 'Second', path: '/second' });
            const a = await service.create({ name: 'A', code: PAGE_SOURCE, menuId: first.id }, null);

            await service.update(a.id, { menuId: second.id }, null);
            const b = await service.create({ name: 'B', code: PAGE_SOURCE, menuId: first.id }, null);

            expect(b.menuId).toBe(first.id);
        });

        it('should throw NotFoundError for unknown ids', async () => {
            await expect(service.update(7, { name: 'x' }, null)).rejects.toThrow(NotFoundError);
        });
    });

    describe('setEnabled', () => {
        it('should toggle without recompiling', async () => {
            const extension = await service.create({ name: 'Page', code: PAGE_SOURCE }, 'alice');
            compiler.compile.mockClear();

            const disabled = await service.setEnabled(extension.id, false, 'bob');

            expect(disabled.isEnabled).toBe(false);
            expect(disabled.updatedBy).toBe('bob');
            expect(compiler.compile).not.toHaveBeenCalled();
            expect((await service.setEnabled(extension.id, true, 'bob')).isEnabled).toBe(true);
        });
    });

    describe('delete', () => {
        it('should delete regular extensions', async () => {
            const extension = await service.create({ name: 'Page', code: PAGE_SOURCE }, null);

            await service.delete(extension.id);

            expect(await service.getById(extension.id)).toBeNull();
        });

        it('should refuse to delete system extensions', async () => {
            const extension = await service.create({ name: 'Core', code: PAGE_SOURCE, isSystem: true }, null);

            await expect(service.delete(extension.id)).rejects.toThrow(ForbiddenError);
            await expect(service.delete(extension.id)).rejects.toThrow('System extension "Core" cannot be deleted');
            expect(await service.getById(extension.id)).not.toBeNull();
        });
    });

    describe('list and stats', () => {
        beforeEach(() => {
            repository.seed(
                buildExtension({ id: 1, name: 'Sales report', type: 'page' }),
                buildExtension({ id: 2, name: 'Clock', type: 'widget', description: 'Shows the time' }),
                buildExtension({ id: 3, name: 'Weather', type: 'widget', isEnabled: false })
            );
        });

        it('should filter by type, enabled flag and search text', async () => {
            expect((await service.list({ type: 'widget' })).map(e => e.id)).toEqual([2, 3]);
            expect((await service.list({ isEnabled: true })).map(e => e.id)).toEqual([1, 2]);
            expect((await service.list({ search: 'TIME' })).map(e => e.id)).toEqual([2]);
            expect((await service.list({ search: 'report' })).map(e => e.id)).toEqual([1]);
        });

        it('should page results', async () => {
            expect((await service.list({ limit: 1, skip: 1 })).map(e => e.id)).toEqual([2]);
        });

        it('should default and cap the limit', async () => {
            const find = vi.spyOn(repository, 'find');

            await service.list();
            await service.list({ limit: 1000, skip: -5, search: '  ' });

            expect(find).toHaveBeenNthCalledWith(1, {
                type: undefined,
                isEnabled: undefined,
                search: undefined,
                limit: 50,
                skip: 0
            });
            expect(find).toHaveBeenNthCalledWith(2, {
                type: undefined,
                isEnabled: undefined,
                search: undefined,
                limit: 200,
                skip: 0
            });
        });

        it('should count extensions', async () => {
            expect(await service.getStats()).toEqual({ total: 3, enabled: 2, pages: 1, widgets: 2 });
        });
    });

    describe('compilePreview', () => {
        it('should compile under the preview id without saving', () => {
            const result = service.compilePreview(PAGE_SOURCE);

            expect(result.code).toBe(`// extension_preview\n${PAGE_SOURCE}\nreturn __sfc__;`);
            expect(repository.snapshot()).toEqual([]);
        });
    });

    describe('resolvePage', () => {
        it('should resolve an enabled page through its menu path', async () => {
            const menu = await menuService.create({ label: 'Reports', path: '/reports' });
            const extension = await service.create({ name: 'Reports', code: PAGE_SOURCE, menuId: menu.id }, null);

            const resolved = await service.resolvePage('reports/');

            expect(resolved).toEqual({
                id: extension.id,
                extensionId: extension.extensionId,
                name: 'Reports',
                type: 'page',
                version: '1.0.0',
                compiledCode: extension.compiledCode,
                updatedAt: extension.updatedAt.toISOString(),
                menu: { id: menu.id, path: '/reports', label: 'Reports' }
            });
            expect(cache.ttls.get(pageCacheKey('/reports'))).toBe(300);
        });

        it('should resolve nothing for unknown paths or unlinked menus', async () => {
            await menuService.create({ label: 'Empty', path: '/empty' });

            expect(await service.resolvePage('/missing')).toBeNull();
            expect(await service.resolvePage('/empty')).toBeNull();
        });

        it('should resolve nothing while the menu is disabled', async () => {
            const menu = await menuService.create({ label: 'Reports', path: '/reports' });
            await service.create({ name: 'Reports', code: PAGE_SOURCE, menuId: menu.id }, null);
            expect(await service.resolvePage('/reports')).not.toBeNull();

            await menuService.update(menu.id, { isEnabled: false });

            expect(await service.resolvePage('/reports')).toBeNull();
        });

        it('should resolve nothing once the extension is disabled', async () => {
            const menu = await menuService.create({ label: 'Reports', path: '/reports' });
            const extension = await service.create({ name: 'Reports', code: PAGE_SOURCE, menuId: menu.id }, null);
            expect(await service.resolvePage('/reports')).not.toBeNull();

            await service.setEnabled(extension.id, false, null);

            expect(await service.resolvePage('/reports')).toBeNull();
            expect(cache.store.has(pageCacheKey('/reports'))).toBe(false);
        });

        it('should follow a menu path change', async () => {
            const menu = await menuService.create({ label: 'Reports', path: '/reports' });
            await service.create({ name: 'Reports', code: PAGE_SOURCE, menuId: menu.id }, null);
            await service.resolvePage('/reports');

            await menuService.update(menu.id, { path: '/sales' });

            expect(await service.resolvePage('/reports')).toBeNull();
            expect((await service.resolvePage('/sales'))?.menu?.path).toBe('/sales');
        });

        it('should refuse to turn a linked menu into a sidebar group', async () => {
            const menu = await menuService.create({ label: 'Reports', path: '/reports' });
            await service.create({ name: 'Reports', code: PAGE_SOURCE, menuId: menu.id }, null);

            const attempt = menuService.update(menu.id, { type: 'mini' });

            await expect(attempt).rejects.toThrow(ValidationError);
            await expect(attempt).rejects.toThrow(
                `Menu ${menu.id} is linked to extension "Reports"; unlink it before turning it into a sidebar group`
            );
            expect(menuService.getById(menu.id)?.type).toBe('menu');
            expect(menuService.getTree().sidebars).toEqual([]);
            expect((await service.resolvePage('/reports'))?.name).toBe('Reports');
        });

        it('should let an unlinked menu become a sidebar group', async () => {
            const menu = await menuService.create({ label: 'Reports', path: '/reports' });

            const updated = await menuService.update(menu.id, { type: 'mini' });

            expect(updated.type).toBe('mini');
        });

        it('should keep the extension but unlink it when its menu is deleted', async () => {
            const menu = await menuService.create({ label: 'Reports', path: '/reports' });
            const extension = await service.create({ name: 'Reports', code: PAGE_SOURCE, menuId: menu.id }, null);
            await service.resolvePage('/reports');

            await menuService.delete(menu.id);

            const stored = await service.getById(extension.id);
            expect(stored?.menuId).toBeNull();
            expect(stored?.updatedBy).toBe('system');
            expect(cache.store.has(pageCacheKey('/reports'))).toBe(false);

            await menuService.create({ label: 'Reports again', path: '/reports' });
            expect(await service.resolvePage('/reports')).toBeNull();
        });

        it('should fall back to the database when the cache fails', async () => {
            const menu = await menuService.create({ label: 'Reports', path: '/reports' });
            await service.create({ name: 'Reports', code: PAGE_SOURCE, menuId: menu.id }, null);
            vi.spyOn(cache, 'get').mockRejectedValue(new Error('redis down'));

            expect((await service.resolvePage('/reports'))?.name).toBe('Reports');
        });
    });

    describe('resolveWidget', () => {
        it('should resolve enabled widgets by id without menu data', async () => {
            const widget = await service.create({ name: 'Clock', type: 'widget', code: WIDGET_SOURCE }, null);

            const resolved = await service.resolveWidget(widget.id);

            expect(resolved?.type).toBe('widget');
            expect(resolved).not.toHaveProperty('menu');
            expect(cache.store.has(widgetCacheKey(widget.id))).toBe(true);
        });

        it('should never serve a page extension by id', async () => {
            const page = await service.create({ name: 'Page', code: PAGE_SOURCE }, null);
            expect(await service.resolveWidget(page.id)).toBeNull();
        });

        it('should stop serving a widget once disabled', async () => {
            const widget = await service.create({ name: 'Clock', type: 'widget', code: WIDGET_SOURCE }, null);
            await service.resolveWidget(widget.id);

            await service.setEnabled(widget.id, false, null);

            expect(await service.resolveWidget(widget.id)).toBeNull();
        });

        it('should serve the latest compiled code after an update', async () => {
            const widget = await service.create({ name: 'Clock', type: 'widget', code: WIDGET_SOURCE }, null);
            await service.resolveWidget(widget.id);

            const updated = await service.update(widget.id, { code: '<template><b>new</b></template>' }, null);

            expect((await service.resolveWidget(widget.id))?.compiledCode).toBe(updated.compiledCode);
        });
    });
});
