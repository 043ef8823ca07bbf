/**
 * Raised when a resolved extension cannot be fetched or turned into a component.
 */
export class ExtensionRuntimeError extends Error {
    constructor(
        message: string,
        public readonly extensionId: string | null = null,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = 'ExtensionRuntimeError';
    }
}
