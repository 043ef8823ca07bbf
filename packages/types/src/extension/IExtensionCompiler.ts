/**
 * Problem found while compiling an extension source.
 */
export interface IExtensionCompileIssue {
    /**
     * SFC block the issue belongs to.
     */
    block: 'sfc' | 'template' | 'script' | 'style' | 'module';
    message: string;
}

export interface IExtensionCompileResult {
    /**
     * Function body evaluated by the runtime with `__modules__` and the
     * injected composables as parameters. Ends with `return __sfc__;`.
     */
    code: string;

    /**
     * Compiled CSS of all style blocks, also attached to the component as `__css`.
     */
    css: string;

    /**
     * Module specifiers the compiled code reads from `__modules__`.
     */
    imports: string[];
}

/**
 * Compiles SFC sources into the runtime module format.
 */
export interface IExtensionCompiler {
    /**
     * @param source - SFC source
     * @param extensionId - Identifier used for the file name and the style scope id
     * @throws CompileError listing every issue when the source cannot be compiled
     */
    compile(source: string, extensionId: string): IExtensionCompileResult;
}
