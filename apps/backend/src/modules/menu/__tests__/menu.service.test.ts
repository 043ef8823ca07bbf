/// <reference types="vitest" />

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { IMenuEvent } from '@enfyra/types';
import { MenuService } from '../menu.service.js';
import { ConflictError, NotFoundError, ValidationError } from '../../../lib/errors.js';
import { InMemoryMenuRepository, buildMenu } from '../../../tests/vitest/mocks/menu-repository.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';

describe('MenuService', () => {
    let repository: InMemoryMenuRepository;
    let service: MenuService;

    beforeEach(async () => {
        repository = new InMemoryMenuRepository();
        service = new MenuService(repository, createMockLogger());
        await service.initialize();
    });

    describe('initialize', () => {
        it('should load stored menus into memory', async () => {
            const seeded = new InMemoryMenuRepository();
            seeded.seed(buildMenu({ id: 3, path: '/reports' }), buildMenu({ id: 7, path: '/logs' }));

            const fresh = new MenuService(seeded, createMockLogger());
            await fresh.initialize();

            expect(fresh.list().map(menu => menu.id)).toEqual([3, 7]);
            expect(fresh.getByPath('/logs')?.id).toBe(7);
        });

        it('should be idempotent', async () => {
            const findAll = vi.spyOn(repository, 'findAll');
            await service.initialize();
            expect(findAll).not.toHaveBeenCalled();
        });
    });

    describe('create', () => {
        it('should apply defaults and persist the menu', async () => {
            const menu = await service.create({ label: 'Reports', path: 'reports/' });

            expect(menu).toMatchObject({
                id: 1,
                type: 'menu',
                label: 'Reports',
                path: '/reports',
                icon: 'lucide:circle',
                sidebarId: null,
                order: 0,
                isEnabled: true,
                description: null
            });
            expect(menu.createdAt).toBeInstanceOf(Date);
            expect(repository.snapshot()).toHaveLength(1);
            expect(repository.snapshot()[0].path).toBe('/reports');
        });

        it('should assign increasing ids', async () => {
            const first = await service.create({ label: 'A', path: '/a' });
            const second = await service.create({ label: 'B', path: '/b' });
            expect([first.id, second.id]).toEqual([1, 2]);
        });

        it('should reject a path that is already taken after normalisation', async () => {
            await service.create({ label: 'Reports', path: '/reports' });

            await expect(service.create({ label: 'Other', path: '//reports/' })).rejects.toThrow(ConflictError);
            await expect(service.create({ label: 'Other', path: '//reports/' })).rejects.toThrow(
                'A menu with path "/reports" already exists'
            );
        });

        it('should reject invalid paths', async () => {
            await expect(service.create({ label: 'Bad', path: '/has space' })).rejects.toThrow(ValidationError);
            expect(repository.snapshot()).toEqual([]);
        });

        it('should reject a blank label', async () => {
            await expect(service.create({ label: '   ', path: '/x' })).rejects.toThrow('Menu label is required');
        });

        it('should group an item under an existing sidebar', async () => {
            const sidebar = await service.create({ type: 'mini', label: 'Tools', path: '/tools' });
            const item = await service.create({ label: 'Logs', path: '/tools/logs', sidebarId: sidebar.id });

            expect(item.sidebarId).toBe(sidebar.id);
        });

        it('should reject a sidebar id that is not a mini entry', async () => {
            const plain = await service.create({ label: 'Plain', path: '/plain' });

            await expect(
                service.create({ label: 'Child', path: '/child', sidebarId: plain.id })
            ).rejects.toThrow(`Sidebar ${plain.id} does not exist`);
            await expect(
                service.create({ label: 'Child', path: '/child', sidebarId: 99 })
            ).rejects.toThrow('Sidebar 99 does not exist');
        });

        it('should reject a mini entry inside another sidebar', async () => {
            const sidebar = await service.create({ type: 'mini', label: 'Tools', path: '/tools' });

            await expect(
                service.create({ type: 'mini', label: 'Nested', path: '/nested', sidebarId: sidebar.id })
            ).rejects.toThrow('Sidebar groups cannot belong to another sidebar');
        });
    });

    describe('events', () => {
        it('should let a before:create subscriber halt creation', async () => {
            service.subscribe('before:create', (event) => {
                if (event.menu.path.startsWith('/admin')) {
                    event.validation.continue = false;
                    event.validation.error = 'The /admin prefix is reserved';
                }
            });

            await expect(service.create({ label: 'Admin', path: '/admin/users' })).rejects.toThrow(
                'The /admin prefix is reserved'
            );
            expect(repository.snapshot()).toEqual([]);
            expect(service.list()).toEqual([]);

            await expect(service.create({ label: 'Users', path: '/users' })).resolves.toMatchObject({ path: '/users' });
        });

        it('should stop the chain at the first halting subscriber', async () => {
            const second = vi.fn();
            service.subscribe('before:delete', (event) => {
                event.validation.continue = false;
            });
            service.subscribe('before:delete', second);

            const menu = await service.create({ label: 'Keep', path: '/keep' });

            await expect(service.delete(menu.id)).rejects.toThrow('Menu delete cancelled by subscriber');
            expect(second).not.toHaveBeenCalled();
            expect(service.getById(menu.id)).not.toBeNull();
        });

        it('should treat a throwing before subscriber as a halt', async () => {
            service.subscribe('before:update', () => {
                throw new Error('locked');
            });
            const menu = await service.create({ label: 'A', path: '/a' });

            await expect(service.update(menu.id, { label: 'B' })).rejects.toThrow('locked');
            expect(service.getById(menu.id)?.label).toBe('A');
        });

        it('should pass the previous state to after:update subscribers', async () => {
            const events: IMenuEvent[] = [];
            service.subscribe('after:update', (event) => {
                events.push(event);
            });
            const menu = await service.create({ label: 'Old', path: '/old' });

            await service.update(menu.id, { label: 'New', path: '/new' });

            expect(events).toHaveLength(1);
            expect(events[0].menu.path).toBe('/new');
            expect(events[0].previous?.path).toBe('/old');
            expect(events[0].validation.continue).toBe(true);
        });

        it('should keep going when an after subscriber throws', async () => {
            const logger = createMockLogger();
            const local = new MenuService(new InMemoryMenuRepository(), logger);
            await local.initialize();
            const observer = vi.fn();
            local.subscribe('after:create', () => {
                throw new Error('observer failed');
            });
            local.subscribe('after:create', observer);

            const menu = await local.create({ label: 'A', path: '/a' });

            expect(menu.id).toBe(1);
            expect(observer).toHaveBeenCalledTimes(1);
            expect(logger.error).toHaveBeenCalledTimes(1);
        });
    });

    describe('update', () => {
        it('should merge the patch and refresh updatedAt', async () => {
            const menu = await service.create({ label: 'Reports', path: '/reports', order: 2 });

            const updated = await service.update(menu.id, { label: 'Sales reports', description: 'Monthly' });

            expect(updated).toMatchObject({
                id: menu.id,
                label: 'Sales reports',
                path: '/reports',
                order: 2,
                description: 'Monthly'
            });
            expect(updated.updatedAt.getTime()).toBeGreaterThanOrEqual(menu.updatedAt.getTime());
            expect(repository.snapshot()[0].label).toBe('Sales reports');
        });

        it('should allow a menu to keep its own path', async () => {
            const menu = await service.create({ label: 'Reports', path: '/reports' });
            await expect(service.update(menu.id, { path: '/reports/' })).resolves.toMatchObject({ path: '/reports' });
        });

        it('should clear nullable fields when null is sent', async () => {
            const sidebar = await service.create({ type: 'mini', label: 'Tools', path: '/tools' });
            const item = await service.create({ label: 'Logs', path: '/logs', sidebarId: sidebar.id, description: 'x' });

            const updated = await service.update(item.id, { sidebarId: null, description: null });

            expect(updated.sidebarId).toBeNull();
            expect(updated.description).toBeNull();
        });

        it('should refuse to turn a non-empty sidebar into a plain menu', async () => {
            const sidebar = await service.create({ type: 'mini', label: 'Tools', path: '/tools' });
            await service.create({ label: 'Logs', path: '/logs', sidebarId: sidebar.id });

            await expect(service.update(sidebar.id, { type: 'menu' })).rejects.toThrow(
                'Sidebar "Tools" still groups 1 menu item(s)'
            );
        });

        it('should throw NotFoundError for unknown ids', async () => {
            await expect(service.update(404, { label: 'x' })).rejects.toThrow(NotFoundError);
        });
    });

    describe('delete', () => {
        it('should remove the menu and emit after:delete', async () => {
            const deleted: number[] = [];
            service.subscribe('after:delete', (event) => {
                deleted.push(event.menu.id);
            });
            const menu = await service.create({ label: 'Reports', path: '/reports' });

            await service.delete(menu.id);

            expect(deleted).toEqual([menu.id]);
            expect(service.getById(menu.id)).toBeNull();
            expect(repository.snapshot()).toEqual([]);
        });

        it('should refuse to delete a sidebar that still groups items', async () => {
            const sidebar = await service.create({ type: 'mini', label: 'Tools', path: '/tools' });
            await service.create({ label: 'Logs', path: '/logs', sidebarId: sidebar.id });

            await expect(service.delete(sidebar.id)).rejects.toThrow(ConflictError);
        });

        it('should delete an empty sidebar', async () => {
            const sidebar = await service.create({ type: 'mini', label: 'Tools', path: '/tools' });
            await expect(service.delete(sidebar.id)).resolves.toBeUndefined();
        });

        it('should throw NotFoundError for unknown ids', async () => {
            await expect(service.delete(12)).rejects.toThrow('Menu not found: 12');
        });
    });

    describe('lookups', () => {
        it('should find menus by normalised path', async () => {
            const menu = await service.create({ label: 'Logs', path: '/tools/logs' });

            expect(service.getByPath('tools//logs/')?.id).toBe(menu.id);
            expect(service.getByPath('/missing')).toBeNull();
            expect(service.getByPath('not a path')).toBeNull();
        });

        it('should return copies that do not affect stored state', async () => {
            const menu = await service.create({ label: 'Logs', path: '/logs' });

            const copy = service.getById(menu.id);
            if (copy) {
                copy.label = 'Changed';
            }

            expect(service.getById(menu.id)?.label).toBe('Logs');
        });
    });

    describe('getTree', () => {
        it('should group items under sidebars sorted by order then id', async () => {
            const tools = await service.create({ type: 'mini', label: 'Tools', path: '/tools', order: 2 });
            const data = await service.create({ type: 'mini', label: 'Data', path: '/data', order: 1 });
            await service.create({ label: 'Logs', path: '/tools/logs', sidebarId: tools.id, order: 5 });
            await service.create({ label: 'Jobs', path: '/tools/jobs', sidebarId: tools.id, order: 1 });
            await service.create({ label: 'Home', path: '/' });

            const tree = service.getTree();

            expect(tree.sidebars.map(sidebar => sidebar.label)).toEqual(['Data', 'Tools']);
            expect(tree.sidebars[0].id).toBe(data.id);
            expect(tree.sidebars[0].items).toEqual([]);
            expect(tree.sidebars[1].items.map(item => item.label)).toEqual(['Jobs', 'Logs']);
            expect(tree.ungrouped.map(item => item.path)).toEqual(['/']);
            expect(tree.generatedAt).toBeInstanceOf(Date);
        });

        it('should list items of a missing sidebar as ungrouped', async () => {
            const local = new InMemoryMenuRepository();
            local.seed(buildMenu({ id: 4, path: '/orphan', sidebarId: 99 }));
            const fresh = new MenuService(local, createMockLogger());
            await fresh.initialize();

            expect(fresh.getTree().ungrouped.map(menu => menu.id)).toEqual([4]);
        });
    });
});
