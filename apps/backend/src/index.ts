#!/usr/bin/env node
/**
 * @fileoverview Application entry point with two-phase lifecycle.
 *
 * Orchestrates startup using a strict init/run separation pattern. All modules
 * complete their init() phase before any starts run(), so no route is mounted
 * until every service it depends on exists.
 *
 * @module index
 */

import http from 'node:http';
import type { Express } from 'express';
import { env } from './config/env.js';
import { attachErrorHandling, createExpressApp } from './loaders/express.js';
import { connectDatabase, disconnectDatabase } from './loaders/database.js';
import { createRedisClient, disconnectRedis } from './loaders/redis.js';
import { logger } from './lib/logger.js';
import { CacheService } from './services/cache.service.js';
import { DatabaseModule } from './modules/database/index.js';
import { MenuModule } from './modules/menu/index.js';
import { ExtensionsModule } from './modules/extensions/index.js';

/**
 * Shared context passed from init phase to run phase.
 */
interface BootstrapContext {
    app: Express;
    server: http.Server;
    modules: {
        database: DatabaseModule;
        menu: MenuModule;
        extensions: ExtensionsModule;
    };
}

/**
 * Init Phase: connect infrastructure and create services.
 *
 * No routes are mounted here. If any init() fails the process exits before
 * exposing partial state.
 *
 * @throws If MongoDB, Redis or any module init() fails
 */
async function bootstrapInit(): Promise<BootstrapContext> {
    const connection = await connectDatabase();
    const redis = createRedisClient();
    await redis.connect();

    const app = createExpressApp();
    const server = http.createServer(app);

    const databaseModule = new DatabaseModule();
    await databaseModule.init({ logger, connection });
    const database = databaseModule.getDatabaseService();

    const cacheService = new CacheService(redis, logger.child({ component: 'cache' }));

    // Menu before extensions: extensions subscribe to menu events
    const menuModule = new MenuModule();
    await menuModule.init({ database, app, logger });

    const extensionsModule = new ExtensionsModule();
    await extensionsModule.init({
        database,
        cacheService,
        menuService: menuModule.getMenuService(),
        app,
        logger,
        config: {
            allowedImports: env.EXTENSION_ALLOWED_IMPORTS,
            cacheTtlSeconds: env.CACHE_TTL_SECONDS
        }
    });

    return {
        app,
        server,
        modules: {
            database: databaseModule,
            menu: menuModule,
            extensions: extensionsModule
        }
    };
}

/**
 * Run Phase: mount routes, then the error handlers that must come last.
 */
async function bootstrapRun(ctx: BootstrapContext): Promise<void> {
    await ctx.modules.database.run();
    await ctx.modules.menu.run();
    await ctx.modules.extensions.run();

    attachErrorHandling(ctx.app);
}

async function shutdown(server: http.Server, signal: string): Promise<void> {
    logger.info({ signal }, 'Shutting down');
    await new Promise<void>(resolve => server.close(() => resolve()));
    await disconnectRedis();
    await disconnectDatabase();
}

/**
 * Main application entry point.
 *
 * @throws Logs error and exits with code 1 if bootstrap fails
 */
async function bootstrap(): Promise<void> {
    try {
        const ctx = await bootstrapInit();
        await bootstrapRun(ctx);

        ctx.server.listen(env.PORT, () => {
            logger.info({ port: env.PORT }, 'Server listening');
        });

        for (const signal of ['SIGINT', 'SIGTERM'] as const) {
            process.once(signal, () => {
                shutdown(ctx.server, signal)
                    .then(() => process.exit(0))
                    .catch(error => {
                        logger.error({ error }, 'Shutdown failed');
                        process.exit(1);
                    });
            });
        }
    } catch (error) {
        logger.error({ error }, 'Failed to bootstrap application');
        process.exit(1);
    }
}

void bootstrap();
