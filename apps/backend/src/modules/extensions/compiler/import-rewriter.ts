/**
 * Rewrites static ES import statements into reads from the `__modules__`
 * object the runtime injects.
 *
 * ```js
 * import { ref, computed as c } from 'vue'
 * // becomes
 * const { ref, computed: c } = __modules__["vue"];
 * ```
 */

const IMPORT_STATEMENT = /^[ \t]*import\s+([\w$*{][\s\S]*?)\s+from\s+(['"])([^'"\n]+)\2[ \t]*;?/gm;
const SIDE_EFFECT_IMPORT = /^[ \t]*import\s+(['"])([^'"\n]+)\1[ \t]*;?/gm;
const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export interface IRewrittenImports {
    code: string;

    /**
     * Specifiers read from `__modules__`, in order of first use.
     */
    specifiers: string[];

    /**
     * Human-readable problems, one per rejected statement.
     */
    errors: string[];
}

function moduleRef(specifier: string): string {
    return `__modules__[${JSON.stringify(specifier)}]`;
}

function namedBindings(clause: string): string | null {
    const inner = clause.replace(/^\{|\}$/g, '').trim();
    if (!inner) {
        return '';
    }
    const parts: string[] = [];
    for (const raw of inner.split(',')) {
        const entry = raw.trim();
        if (!entry) {
            continue;
        }
        const match = /^([A-Za-z_$][\w$]*)(?:\s+as\s+([A-Za-z_$][\w$]*))?$/.exec(entry);
        if (!match) {
            return null;
        }
        const [, imported, local] = match;
        parts.push(local && local !== imported ? `${imported}: ${local}` : imported);
    }
    return parts.join(', ');
}

/**
 * Translate one import clause into `const` declarations.
 *
 * @returns The replacement statements, or null when the clause is not understood
 */
function translateClause(clause: string, specifier: string): string | null {
    const ref = moduleRef(specifier);
    const trimmed = clause.trim();

    if (trimmed.startsWith('{')) {
        const bindings = namedBindings(trimmed);
        return bindings === null ? null : bindings ? `const { ${bindings} } = ${ref};` : '';
    }

    const namespace = /^\*\s+as\s+([A-Za-z_$][\w$]*)$/.exec(trimmed);
    if (namespace) {
        return `const ${namespace[1]} = ${ref};`;
    }

    const comma = trimmed.indexOf(',');
    const defaultName = (comma === -1 ? trimmed : trimmed.slice(0, comma)).trim();
    if (!IDENTIFIER.test(defaultName) || defaultName === 'type') {
        return null;
    }
    const statements = [`const ${defaultName} = ${ref}.default ?? ${ref};`];

    if (comma !== -1) {
        const rest = translateClause(trimmed.slice(comma + 1), specifier);
        if (rest === null || rest.startsWith(`const ${defaultName} `)) {
            return null;
        }
        if (rest) {
            statements.push(rest);
        }
    }
    return statements.join(' ');
}

/**
 * Rewrite every static import in `code`.
 *
 * Imports of specifiers outside `allowed` are reported and removed. Dynamic
 * `import()` calls and import statements the rewriter cannot parse are
 * reported as well.
 */
export function rewriteImports(code: string, allowed: ReadonlySet<string>): IRewrittenImports {
    const specifiers: string[] = [];
    const errors: string[] = [];

    let output = code.replace(IMPORT_STATEMENT, (statement: string, clause: string, _quote: string, specifier: string) => {
        if (!allowed.has(specifier)) {
            errors.push(`Import of "${specifier}" is not allowed`);
            return '';
        }
        const replacement = translateClause(clause, specifier);
        if (replacement === null) {
            errors.push(`Unsupported import statement: ${statement.trim()}`);
            return '';
        }
        if (!specifiers.includes(specifier)) {
            specifiers.push(specifier);
        }
        return replacement;
    });

    output = output.replace(SIDE_EFFECT_IMPORT, (_statement: string, _quote: string, specifier: string) => {
        errors.push(`Side-effect import of "${specifier}" is not allowed`);
        return '';
    });

    if (/^[ \t]*import[\s{*'"]/m.test(output)) {
        errors.push('Unsupported import statement');
    }
    if (/(^|[^.\w$])import\s*\(/.test(output)) {
        errors.push('Dynamic import() is not allowed');
    }

    return { code: output, specifiers, errors };
}
