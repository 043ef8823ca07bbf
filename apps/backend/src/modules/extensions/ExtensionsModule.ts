/**
 * Extensions module implementation.
 *
 * Stores user-authored Vue SFC extensions, compiles them on every save and
 * resolves what the dashboard runtime may render. Follows the two-phase
 * init/run module pattern with dependency injection.
 */

import type { Express } from 'express';
import type {
    ICacheService,
    IDatabaseService,
    ILogger,
    IMenuService,
    IModule,
    IModuleMetadata
} from '@enfyra/types';
import { requireAdmin } from '../../api/middleware/admin-auth.js';
import { ExtensionCompiler } from './compiler/extension-compiler.js';
import { ExtensionRepository } from './repositories/extension.repository.js';
import { ExtensionService } from './services/extension.service.js';
import { ExtensionsController } from './api/extensions.controller.js';
import { RuntimeController } from './api/runtime.controller.js';
import { createExtensionsRouter } from './api/extensions.routes.js';
import { createRuntimeRouter } from './api/runtime.public-routes.js';

/**
 * Extensions module dependencies, injected at application bootstrap.
 */
export interface IExtensionsModuleDependencies {
    database: IDatabaseService;

    /**
     * Redis cache for resolved runtime payloads.
     */
    cacheService: ICacheService;

    /**
     * Menu service from MenuModule. Page extensions are resolved through it and
     * its delete events unlink extensions.
     */
    menuService: IMenuService;

    app: Express;
    logger: ILogger;

    config: {
        /**
         * Module specifiers extension code may import (`vue` by default).
         */
        allowedImports: readonly string[];

        cacheTtlSeconds: number;
    };
}

/**
 * Extensions module.
 *
 * ## Lifecycle
 *
 * ### init() phase:
 * - Ensures the `extension_definition` indexes
 * - Creates the compiler, service and controllers
 * - Subscribes to menu events (must happen before any menu is deleted)
 *
 * ### run() phase:
 * - Mounts the admin router at /api/extensions (requireAdmin)
 * - Mounts the public runtime router at /api/runtime
 *
 * @example
 * ```typescript
 * const extensionsModule = new ExtensionsModule();
 * await extensionsModule.init({
 *     database,
 *     cacheService,
 *     menuService: menuModule.getMenuService(),
 *     app,
 *     logger,
 *     config: { allowedImports: env.EXTENSION_ALLOWED_IMPORTS, cacheTtlSeconds: env.CACHE_TTL_SECONDS }
 * });
 * await extensionsModule.run();
 * ```
 */
export class ExtensionsModule implements IModule<IExtensionsModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'extensions',
        name: 'Extensions',
        version: '1.0.0',
        description: 'Vue SFC page and widget extensions with on-save compilation'
    };

    private app: Express | null = null;
    private logger: ILogger | null = null;
    private extensionService: ExtensionService | null = null;
    private extensionsController: ExtensionsController | null = null;
    private runtimeController: RuntimeController | null = null;

    async init(dependencies: IExtensionsModuleDependencies): Promise<void> {
        const logger = dependencies.logger.child({ module: 'extensions' });
        this.logger = logger;
        logger.info('Initializing extensions module...');

        this.app = dependencies.app;

        const repository = new ExtensionRepository(dependencies.database);
        await repository.ensureIndexes();

        const compiler = new ExtensionCompiler(dependencies.config.allowedImports);
        this.extensionService = new ExtensionService(
            repository,
            dependencies.menuService,
            compiler,
            dependencies.cacheService,
            logger,
            { cacheTtlSeconds: dependencies.config.cacheTtlSeconds }
        );
        this.extensionService.attachMenuEvents();

        this.extensionsController = new ExtensionsController(this.extensionService);
        this.runtimeController = new RuntimeController(this.extensionService);

        logger.info({ allowedImports: dependencies.config.allowedImports }, 'Extensions module initialized');
    }

    async run(): Promise<void> {
        if (!this.app || !this.logger || !this.extensionsController || !this.runtimeController) {
            throw new Error('ExtensionsModule not initialized - call init() first');
        }

        this.app.use('/api/extensions', requireAdmin, createExtensionsRouter(this.extensionsController));
        this.logger.info('Extensions admin router mounted at /api/extensions');

        this.app.use('/api/runtime', createRuntimeRouter(this.runtimeController));
        this.logger.info('Extensions runtime router mounted at /api/runtime');
    }

    /**
     * @throws {Error} If called before init() completes
     */
    getExtensionService(): ExtensionService {
        if (!this.extensionService) {
            throw new Error('ExtensionsModule not initialized - call init() first');
        }
        return this.extensionService;
    }
}
