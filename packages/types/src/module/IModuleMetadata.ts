/**
 * Descriptive metadata every module exposes for logging and introspection.
 */
export interface IModuleMetadata {
    /**
     * Stable identifier (e.g. `menu`, `extensions`).
     */
    id: string;
    name: string;
    version: string;
    description?: string;
}
