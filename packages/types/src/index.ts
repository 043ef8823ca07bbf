/**
 * Shared contracts for the Enfyra admin back end, the extension runtime and the
 * scaffolding CLI. The package holds types only; nothing here exists at runtime.
 */
export type * from './menu/index.js';
export type * from './extension/index.js';
export type * from './module/index.js';
export type { IDatabaseService } from './database/IDatabaseService.js';
export type { ILogger } from './logging/ILogger.js';
export type { ICacheService } from './services/ICacheService.js';
