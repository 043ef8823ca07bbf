import { ExtensionRuntimeError } from './errors.js';

/**
 * Component object returned by compiled extension code.
 *
 * Besides the regular Vue component options the compiler attaches `__css`
 * (compiled styles), `__scopeId` (when a style block is scoped) and `__file`.
 */
export interface IExtensionComponent {
    [option: string]: unknown;
    __css?: string;
    __scopeId?: string;
    __file?: string;
}

export interface IExtensionScope {
    /**
     * Module map read by rewritten imports, e.g. `{ vue: Vue }`.
     */
    modules: Record<string, unknown>;

    /**
     * Extra bindings exposed to the code as free variables, e.g. `useApi`.
     */
    composables?: Record<string, unknown>;
}

const MODULES_PARAM = '__modules__';
const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Whether a name can be bound as a strict-mode parameter. Reserved words and
 * `eval`/`arguments` fail to parse, which the engine reports for us.
 */
function isBindableName(name: string): boolean {
    if (!IDENTIFIER.test(name)) {
        return false;
    }
    try {
        new Function(`"use strict"; let ${name};`);
        return true;
    } catch {
        return false;
    }
}

function isComponent(value: unknown): value is IExtensionComponent {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }
    const css: unknown = Reflect.get(value, '__css');
    return css === undefined || typeof css === 'string';
}

/**
 * Evaluate compiled extension code and return its component.
 *
 * The code is a function body taking `__modules__` followed by one parameter
 * per composable, in the key order of `scope.composables`.
 *
 * @throws ExtensionRuntimeError when a composable name cannot be bound, the
 *   code does not parse or throws, or it returns something other than an object
 */
export function instantiateExtension(
    compiledCode: string,
    scope: IExtensionScope,
    extensionId: string | null = null
): IExtensionComponent {
    const entries = Object.entries(scope.composables ?? {});

    for (const [name] of entries) {
        if (name === MODULES_PARAM || !isBindableName(name)) {
            throw new ExtensionRuntimeError(`Invalid composable name "${name}"`, extensionId);
        }
    }

    let factory: Function;
    try {
        factory = new Function(MODULES_PARAM, ...entries.map(([name]) => name), compiledCode);
    } catch (error) {
        throw new ExtensionRuntimeError('Extension code failed to parse', extensionId, { cause: error });
    }

    let result: unknown;
    try {
        result = Reflect.apply(factory, undefined, [scope.modules, ...entries.map(([, value]) => value)]);
    } catch (error) {
        throw new ExtensionRuntimeError('Extension code threw while loading', extensionId, { cause: error });
    }

    if (!isComponent(result)) {
        throw new ExtensionRuntimeError('Extension code did not return a component', extensionId);
    }
    return result;
}
