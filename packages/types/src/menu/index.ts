/**
 * Menu type definitions shared by the back end and the dashboard host.
 */
export type { MenuType, IMenu, IMenuCreateInput, IMenuUpdateInput } from './IMenu.js';
export type { IMenuSidebar, IMenuTree } from './IMenuTree.js';
export type { IMenuValidation, MenuEventType, IMenuEvent, MenuEventSubscriber } from './IMenuEvent.js';
export type { IMenuRepository } from './IMenuRepository.js';
export type { IMenuService } from './IMenuService.js';
