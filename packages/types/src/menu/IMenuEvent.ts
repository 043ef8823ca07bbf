import type { IMenu } from './IMenu.js';

/**
 * Validation context passed through `before:*` subscribers.
 *
 * Setting `continue` to false halts the chain; the pending operation is then
 * rejected with `error` as its message and nothing is persisted.
 */
export interface IMenuValidation {
    continue: boolean;
    error?: string;
}

export type MenuEventType =
    | 'before:create'
    | 'after:create'
    | 'before:update'
    | 'after:update'
    | 'before:delete'
    | 'after:delete';

/**
 * Event payload handed to menu subscribers.
 */
export interface IMenuEvent {
    type: MenuEventType;

    /**
     * The menu being created, updated or deleted. For `before:create` the id is
     * already reserved, so subscribers see the record exactly as it will be stored.
     */
    menu: IMenu;

    /**
     * State before the operation, present for update and delete events.
     */
    previous?: IMenu;

    /**
     * Only meaningful for `before:*` events. After events always carry `continue: true`.
     */
    validation: IMenuValidation;

    timestamp: Date;
}

export type MenuEventSubscriber = (event: IMenuEvent) => Promise<void> | void;
