/**
 * Menu module public API.
 *
 * ```typescript
 * import { MenuModule } from './modules/menu/index.js';
 *
 * const menuModule = new MenuModule();
 * await menuModule.init({ database, app, logger });
 * await menuModule.run();
 * ```
 */

export { MenuModule } from './MenuModule.js';
export type { IMenuModuleDependencies } from './MenuModule.js';
export { MenuService, DEFAULT_MENU_ICON } from './menu.service.js';
export { MenuController } from './menu.controller.js';
export { MenuRepository, MENU_COLLECTION } from './repositories/menu.repository.js';
export { normalizeMenuPath } from './menu-path.js';
