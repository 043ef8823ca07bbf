/**
 * Menu module implementation.
 *
 * Owns the admin-configured navigation: sidebar groups and the menu items that
 * Page extensions are reached through. Follows the two-phase init/run module
 * pattern with dependency injection.
 */

import type { Express, Router } from 'express';
import { Router as ExpressRouter } from 'express';
import type { IDatabaseService, ILogger, IModule, IModuleMetadata } from '@enfyra/types';
import { MenuService } from './menu.service.js';
import { MenuController } from './menu.controller.js';
import { MenuRepository } from './repositories/menu.repository.js';
import { requireAdmin } from '../../api/middleware/admin-auth.js';
import { asyncHandler } from '../../api/middleware/async-handler.js';

/**
 * Menu module dependencies, injected at application bootstrap.
 */
export interface IMenuModuleDependencies {
    database: IDatabaseService;

    /**
     * Express application the module mounts its router on during run().
     */
    app: Express;

    logger: ILogger;
}

/**
 * Menu module for navigation management.
 *
 * ## Lifecycle
 *
 * ### init() phase:
 * - Ensures the `menu_definition` indexes
 * - Creates MenuService and loads every menu into memory
 * - Creates the controller, does NOT mount routes yet
 *
 * ### run() phase:
 * - Mounts the router at /api/menu
 *
 * Other modules get the service through {@link getMenuService} after init()
 * and subscribe to its events there.
 *
 * @example
 * ```typescript
 * const menuModule = new MenuModule();
 * await menuModule.init({ database, app, logger });
 *
 * const extensionsModule = new ExtensionsModule();
 * await extensionsModule.init({ ..., menuService: menuModule.getMenuService() });
 *
 * await menuModule.run();
 * ```
 */
export class MenuModule implements IModule<IMenuModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'menu',
        name: 'Menu',
        version: '1.0.0',
        description: 'Sidebar groups and menu items with event-driven validation'
    };

    private app: Express | null = null;
    private menuService: MenuService | null = null;
    private controller: MenuController | null = null;
    private logger: ILogger | null = null;

    /**
     * Prepare the module. Loads menus from the database but mounts nothing.
     *
     * @throws {Error} If the database is unreachable (causes application shutdown)
     */
    async init(dependencies: IMenuModuleDependencies): Promise<void> {
        const logger = dependencies.logger.child({ module: 'menu' });
        this.logger = logger;
        logger.info('Initializing menu module...');

        this.app = dependencies.app;

        const repository = new MenuRepository(dependencies.database);
        await repository.ensureIndexes();

        this.menuService = new MenuService(repository, logger);
        await this.menuService.initialize();

        this.controller = new MenuController(this.menuService);

        logger.info('Menu module initialized');
    }

    /**
     * Mount the menu router on the injected Express app.
     */
    async run(): Promise<void> {
        if (!this.app || !this.controller || !this.logger) {
            throw new Error('MenuModule not initialized - call init() first');
        }

        this.app.use('/api/menu', this.createRouter(this.controller));
        this.logger.info('Menu router mounted at /api/menu');
    }

    /**
     * Routes:
     * - GET    /api/menu      - Sidebar tree (public)
     * - GET    /api/menu/:id  - Single menu (public)
     * - POST   /api/menu      - Create (admin)
     * - PATCH  /api/menu/:id  - Update (admin)
     * - DELETE /api/menu/:id  - Delete (admin)
     *
     * @internal
     */
    private createRouter(controller: MenuController): Router {
        const router = ExpressRouter();

        router.get('/', asyncHandler(controller.getTree));
        router.get('/:id', asyncHandler(controller.getById));

        router.post('/', requireAdmin, asyncHandler(controller.create));
        router.patch('/:id', requireAdmin, asyncHandler(controller.update));
        router.delete('/:id', requireAdmin, asyncHandler(controller.delete));

        return router;
    }

    /**
     * @throws {Error} If called before init() completes
     */
    getMenuService(): MenuService {
        if (!this.menuService) {
            throw new Error('MenuModule not initialized - call init() first');
        }
        return this.menuService;
    }
}
