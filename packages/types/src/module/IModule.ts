import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Two-phase lifecycle contract for back-end modules.
 *
 * Bootstrap calls `init()` on every module before calling `run()` on any of
 * them. `init()` creates services and loads state without side effects visible
 * to clients; `run()` mounts routes and wires cross-module subscriptions.
 *
 * @typeParam TDependencies - Dependencies injected at init time
 */
export interface IModule<TDependencies extends object = Record<string, unknown>> {
    readonly metadata: IModuleMetadata;

    /**
     * @throws Error if the module cannot be prepared; bootstrap aborts
     */
    init(dependencies: TDependencies): Promise<void>;

    run(): Promise<void>;
}
