import type {
    ILogger,
    IMenu,
    IMenuCreateInput,
    IMenuEvent,
    IMenuRepository,
    IMenuService,
    IMenuSidebar,
    IMenuTree,
    IMenuUpdateInput,
    IMenuValidation,
    MenuEventSubscriber,
    MenuEventType
} from '@enfyra/types';
import { ConflictError, NotFoundError, ValidationError } from '../../lib/errors.js';
import { normalizeMenuPath } from './menu-path.js';

export const DEFAULT_MENU_ICON = 'lucide:circle';
const MAX_LABEL_LENGTH = 200;

function byOrderThenId(a: IMenu, b: IMenu): number {
    return a.order - b.order || a.id - b.id;
}

/**
 * Service owning the admin-configured navigation.
 *
 * All menus are loaded into memory on {@link initialize} and kept in sync by
 * create/update/delete, so reads (`getTree`, `getByPath`) never touch the
 * database. Mutations go through the repository first and only then update
 * the in-memory map.
 *
 * Event flow for every mutation:
 * 1. Validate the candidate record (path, label, sidebar grouping)
 * 2. Emit `before:*`; a subscriber may set `validation.continue = false`
 * 3. Persist through {@link IMenuRepository}
 * 4. Update the in-memory map
 * 5. Emit `after:*` (cannot be halted)
 *
 * @example
 * ```typescript
 * menuService.subscribe('before:create', (event) => {
 *     if (event.menu.path.startsWith('/admin')) {
 *         event.validation.continue = false;
 *         event.validation.error = 'The /admin prefix is reserved';
 *     }
 * });
 *
 * const reports = await menuService.create({ label: 'Reports', path: '/reports' });
 * ```
 */
export class MenuService implements IMenuService {
    private readonly menus = new Map<number, IMenu>();
    private readonly subscribers = new Map<MenuEventType, MenuEventSubscriber[]>();
    private initialized = false;

    constructor(
        private readonly repository: IMenuRepository,
        private readonly logger: ILogger
    ) {}

    /**
     * Load every stored menu into memory. Subsequent calls are no-ops.
     */
    public async initialize(): Promise<void> {
        if (this.initialized) {
            this.logger.debug('MenuService already initialized, skipping');
            return;
        }

        const menus = await this.repository.findAll();
        this.menus.clear();
        for (const menu of menus) {
            this.menus.set(menu.id, menu);
        }

        this.initialized = true;
        this.logger.info({ menuCount: menus.length }, 'MenuService initialized');
    }

    /**
     * Register a subscriber for a menu event.
     *
     * Subscribers run in registration order. For `before:*` events the first
     * subscriber that sets `validation.continue = false` (or throws) stops the
     * chain and the operation fails with a {@link ValidationError}.
     */
    public subscribe(eventType: MenuEventType, subscriber: MenuEventSubscriber): void {
        const existing = this.subscribers.get(eventType);
        if (existing) {
            existing.push(subscriber);
        } else {
            this.subscribers.set(eventType, [subscriber]);
        }
        this.logger.debug({ eventType }, 'Menu event subscriber registered');
    }

    /**
     * Create a menu.
     *
     * @throws ValidationError when the path, label, order or sidebar is invalid, or a subscriber halts
     * @throws ConflictError when another menu already uses the normalised path
     */
    public async create(input: IMenuCreateInput): Promise<IMenu> {
        const now = new Date();
        const candidate: IMenu = {
            id: 0,
            type: input.type ?? 'menu',
            label: input.label.trim(),
            path: this.requirePath(input.path),
            icon: input.icon?.trim() || DEFAULT_MENU_ICON,
            sidebarId: input.sidebarId ?? null,
            order: input.order ?? 0,
            isEnabled: input.isEnabled ?? true,
            description: input.description ?? null,
            createdAt: now,
            updatedAt: now
        };
        this.validate(candidate, null);

        const menu: IMenu = { ...candidate, id: await this.repository.nextId() };

        await this.emitBefore('before:create', menu);
        await this.repository.insert(menu);
        this.menus.set(menu.id, menu);
        await this.emitAfter('after:create', menu);

        this.logger.info({ menuId: menu.id, path: menu.path }, 'Menu created');
        return { ...menu };
    }

    /**
     * Apply a partial update. Validation runs against the merged record.
     *
     * @throws NotFoundError when no menu has this id
     * @throws ConflictError when the new path is taken or a non-empty sidebar would become a plain menu
     */
    public async update(id: number, patch: IMenuUpdateInput): Promise<IMenu> {
        const existing = this.requireMenu(id);

        const updated: IMenu = {
            ...existing,
            type: patch.type ?? existing.type,
            label: patch.label !== undefined ? patch.label.trim() : existing.label,
            path: patch.path !== undefined ? this.requirePath(patch.path) : existing.path,
            icon: patch.icon !== undefined ? patch.icon.trim() || DEFAULT_MENU_ICON : existing.icon,
            sidebarId: patch.sidebarId !== undefined ? patch.sidebarId : existing.sidebarId,
            order: patch.order ?? existing.order,
            isEnabled: patch.isEnabled ?? existing.isEnabled,
            description: patch.description !== undefined ? patch.description : existing.description,
            updatedAt: new Date()
        };

        if (existing.type === 'mini' && updated.type === 'menu') {
            const grouped = this.countItems(id);
            if (grouped > 0) {
                throw new ConflictError(`Sidebar "${existing.label}" still groups ${grouped} menu item(s)`);
            }
        }
        this.validate(updated, id);

        await this.emitBefore('before:update', updated, existing);

        const replaced = await this.repository.replace(updated);
        if (!replaced) {
            this.menus.delete(id);
            throw new NotFoundError(`Menu not found: ${id}`);
        }
        this.menus.set(id, updated);
        await this.emitAfter('after:update', updated, existing);

        this.logger.info({ menuId: id, path: updated.path }, 'Menu updated');
        return { ...updated };
    }

    /**
     * Delete a menu. `after:delete` subscribers receive the removed record.
     *
     * @throws NotFoundError when no menu has this id
     * @throws ConflictError when the menu is a sidebar that still groups items
     */
    public async delete(id: number): Promise<void> {
        const existing = this.requireMenu(id);

        if (existing.type === 'mini') {
            const grouped = this.countItems(id);
            if (grouped > 0) {
                throw new ConflictError(`Sidebar "${existing.label}" still groups ${grouped} menu item(s)`);
            }
        }

        await this.emitBefore('before:delete', existing, existing);
        await this.repository.delete(id);
        this.menus.delete(id);
        await this.emitAfter('after:delete', existing, existing);

        this.logger.info({ menuId: id, path: existing.path }, 'Menu deleted');
    }

    public getById(id: number): IMenu | null {
        const menu = this.menus.get(id);
        return menu ? { ...menu } : null;
    }

    public getByPath(path: string): IMenu | null {
        const normalized = normalizeMenuPath(path);
        if (!normalized) {
            return null;
        }
        for (const menu of this.menus.values()) {
            if (menu.path === normalized) {
                return { ...menu };
            }
        }
        return null;
    }

    /**
     * All menus sorted by id.
     */
    public list(): IMenu[] {
        return Array.from(this.menus.values())
            .sort((a, b) => a.id - b.id)
            .map(menu => ({ ...menu }));
    }

    /**
     * Build the sidebar structure from the in-memory map.
     *
     * Items whose sidebar no longer exists are listed as ungrouped rather than dropped.
     */
    public getTree(): IMenuTree {
        const all = Array.from(this.menus.values()).sort(byOrderThenId);
        const sidebarIds = new Set(all.filter(menu => menu.type === 'mini').map(menu => menu.id));

        const sidebars: IMenuSidebar[] = all
            .filter(menu => menu.type === 'mini')
            .map(sidebar => ({
                ...sidebar,
                items: all
                    .filter(item => item.type === 'menu' && item.sidebarId === sidebar.id)
                    .map(item => ({ ...item }))
            }));

        const ungrouped = all
            .filter(menu => menu.type === 'menu' && (menu.sidebarId === null || !sidebarIds.has(menu.sidebarId)))
            .map(menu => ({ ...menu }));

        return { sidebars, ungrouped, generatedAt: new Date() };
    }

    private requireMenu(id: number): IMenu {
        const menu = this.menus.get(id);
        if (!menu) {
            throw new NotFoundError(`Menu not found: ${id}`);
        }
        return menu;
    }

    private requirePath(raw: string): string {
        const path = normalizeMenuPath(raw);
        if (!path) {
            throw new ValidationError(
                `Invalid menu path "${raw}": use letters, digits, "/", "_" and "-" only`
            );
        }
        return path;
    }

    private countItems(sidebarId: number): number {
        let count = 0;
        for (const menu of this.menus.values()) {
            if (menu.sidebarId === sidebarId) {
                count++;
            }
        }
        return count;
    }

    /**
     * Check label, order, path uniqueness and sidebar grouping of a candidate.
     *
     * @param selfId - Id of the menu being updated, or null on create
     */
    private validate(menu: IMenu, selfId: number | null): void {
        if (!menu.label) {
            throw new ValidationError('Menu label is required');
        }
        if (menu.label.length > MAX_LABEL_LENGTH) {
            throw new ValidationError(`Menu label must be at most ${MAX_LABEL_LENGTH} characters`);
        }
        if (!Number.isInteger(menu.order) || menu.order < 0) {
            throw new ValidationError('Menu order must be a non-negative integer');
        }

        for (const other of this.menus.values()) {
            if (other.id !== selfId && other.path === menu.path) {
                throw new ConflictError(`A menu with path "${menu.path}" already exists`);
            }
        }

        if (menu.sidebarId === null) {
            return;
        }
        if (menu.type === 'mini') {
            throw new ValidationError('Sidebar groups cannot belong to another sidebar');
        }
        const sidebar = this.menus.get(menu.sidebarId);
        if (!sidebar || sidebar.type !== 'mini') {
            throw new ValidationError(`Sidebar ${menu.sidebarId} does not exist`);
        }
    }

    /**
     * Run `before:*` subscribers and reject the operation when one halts it.
     */
    private async emitBefore(eventType: MenuEventType, menu: IMenu, previous?: IMenu): Promise<void> {
        const validation = await this.emitEvent(eventType, menu, previous);
        if (!validation.continue) {
            throw new ValidationError(validation.error || `Menu ${eventType.slice('before:'.length)} cancelled by subscriber`);
        }
    }

    private async emitAfter(eventType: MenuEventType, menu: IMenu, previous?: IMenu): Promise<void> {
        await this.emitEvent(eventType, menu, previous);
    }

    private async emitEvent(eventType: MenuEventType, menu: IMenu, previous?: IMenu): Promise<IMenuValidation> {
        const validation: IMenuValidation = { continue: true };
        const event: IMenuEvent = {
            type: eventType,
            menu: { ...menu },
            previous: previous ? { ...previous } : undefined,
            validation,
            timestamp: new Date()
        };
        const isBefore = eventType.startsWith('before:');

        for (const subscriber of this.subscribers.get(eventType) ?? []) {
            try {
                await subscriber(event);
            } catch (error) {
                this.logger.error({ eventType, menuId: menu.id, error }, 'Menu event subscriber threw error');
                if (isBefore) {
                    validation.continue = false;
                    validation.error = error instanceof Error ? error.message : String(error);
                }
            }

            if (isBefore && !validation.continue) {
                this.logger.debug({ eventType, reason: validation.error }, 'Menu event halted by subscriber');
                break;
            }
        }

        if (!isBefore) {
            validation.continue = true;
        }
        return validation;
    }
}
