/**
 * Database module implementation.
 *
 * Wraps the Mongoose connection in a {@link DatabaseService} that other modules
 * receive through dependency injection. The module owns no routes; it exists
 * so database access follows the same init/run lifecycle as everything else.
 */

import type { Connection } from 'mongoose';
import type { ILogger, IModule, IModuleMetadata } from '@enfyra/types';
import { DatabaseService } from './services/database.service.js';

/**
 * Database module dependencies for initialization.
 */
export interface IDatabaseModuleDependencies {
    logger: ILogger;

    /**
     * Established Mongoose connection.
     */
    connection: Connection;
}

export class DatabaseModule implements IModule<IDatabaseModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'database',
        name: 'Database',
        version: '1.0.0',
        description: 'MongoDB access and numeric id sequences for all modules'
    };

    private logger: ILogger | null = null;
    private databaseService?: DatabaseService;

    /**
     * Create the core database service.
     *
     * @param dependencies - Logger and established connection
     */
    async init(dependencies: IDatabaseModuleDependencies): Promise<void> {
        this.logger = dependencies.logger.child({ module: 'database' });
        this.databaseService = new DatabaseService(this.logger, dependencies.connection);
        this.logger.info('Database module initialized');
    }

    async run(): Promise<void> {
        if (!this.logger) {
            throw new Error('DatabaseModule not initialized - call init() first');
        }
        this.logger.info('Database module running');
    }

    /**
     * @throws {Error} If called before init() completes
     */
    getDatabaseService(): DatabaseService {
        if (!this.databaseService) {
            throw new Error('DatabaseModule not initialized - call init() first');
        }
        return this.databaseService;
    }
}
