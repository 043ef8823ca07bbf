import { createHash } from 'node:crypto';
import { compileScript, compileStyle, compileTemplate, parse } from '@vue/compiler-sfc';
import type { BindingMetadata, SFCDescriptor } from '@vue/compiler-sfc';
import type { IExtensionCompileIssue, IExtensionCompileResult, IExtensionCompiler } from '@enfyra/types';
import { CompileError } from '../../../lib/errors.js';
import { rewriteImports } from './import-rewriter.js';

/**
 * Name of the component binding inside the compiled function body.
 */
export const COMPONENT_BINDING = '__sfc__';

const SCRIPT_LANGS = new Set(['js', 'javascript']);
const STYLE_LANGS = new Set(['css']);

/**
 * Derive the scope hash for an extension: the first 8 hex characters of
 * sha256(extensionId). Scoped styles use `data-v-<hash>`.
 */
export function scopeHash(extensionId: string): string {
    return createHash('sha256').update(extensionId).digest('hex').slice(0, 8);
}

function messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Compiles Vue single-file components into the extension runtime format.
 *
 * The output is a function body, not a module. The runtime evaluates it with
 * `__modules__` (a specifier to module map) followed by any injected
 * composables, and receives the component object from the final
 * `return __sfc__;`.
 *
 * Compilation steps:
 * 1. Parse the SFC and check block languages
 * 2. Compile `<script setup>` with an inlined template, or a plain `<script>`
 *    plus a separately compiled render function
 * 3. Compile styles, scoping them with `data-v-<hash>` where requested
 * 4. Rewrite `import` statements to `__modules__` reads, rejecting anything
 *    outside the allow-list
 *
 * @example
 * ```typescript
 * const compiler = new ExtensionCompiler(['vue']);
 * const { code, css } = compiler.compile(source, 'extension_0123456789ab');
 * ```
 */
export class ExtensionCompiler implements IExtensionCompiler {
    private readonly allowedImports: ReadonlySet<string>;

    constructor(allowedImports: readonly string[]) {
        this.allowedImports = new Set(allowedImports);
    }

    /**
     * @throws CompileError listing every problem found
     */
    compile(source: string, extensionId: string): IExtensionCompileResult {
        const filename = `${extensionId}.vue`;
        const hash = scopeHash(extensionId);
        const issues: IExtensionCompileIssue[] = [];

        const { descriptor, errors } = parse(source, { filename, sourceMap: false });
        for (const error of errors) {
            issues.push({ block: 'sfc', message: messageOf(error) });
        }
        if (issues.length > 0) {
            throw new CompileError(issues);
        }

        this.checkBlocks(descriptor, issues);
        if (issues.length > 0) {
            throw new CompileError(issues);
        }

        const hasScoped = descriptor.styles.some(style => style.scoped);
        const script = this.compileComponent(descriptor, filename, hash, hasScoped, issues);
        const css = this.compileStyles(descriptor, filename, hash, issues);
        if (issues.length > 0) {
            throw new CompileError(issues);
        }

        const rewritten = rewriteImports(script, this.allowedImports);
        for (const message of rewritten.errors) {
            issues.push({ block: 'module', message });
        }
        if (/^[ \t]*export\s/m.test(rewritten.code)) {
            issues.push({ block: 'module', message: 'Named exports are not supported in extensions' });
        }
        if (issues.length > 0) {
            throw new CompileError(issues);
        }

        const lines = [rewritten.code.trim()];
        if (hasScoped) {
            lines.push(`${COMPONENT_BINDING}.__scopeId = ${JSON.stringify(`data-v-${hash}`)};`);
        }
        if (css) {
            lines.push(`${COMPONENT_BINDING}.__css = ${JSON.stringify(css)};`);
        }
        lines.push(`${COMPONENT_BINDING}.__file = ${JSON.stringify(filename)};`);
        lines.push(`return ${COMPONENT_BINDING};`);

        return { code: lines.join('\n'), css, imports: rewritten.specifiers };
    }

    private checkBlocks(descriptor: SFCDescriptor, issues: IExtensionCompileIssue[]): void {
        const { template, script, scriptSetup, styles } = descriptor;

        if (!template && !script && !scriptSetup) {
            issues.push({ block: 'sfc', message: 'Extension source must contain a <template> or <script> block' });
        }
        if (template?.lang && template.lang !== 'html') {
            issues.push({ block: 'template', message: `Unsupported template language "${template.lang}"` });
        }
        for (const block of [script, scriptSetup]) {
            if (block?.lang && !SCRIPT_LANGS.has(block.lang)) {
                issues.push({ block: 'script', message: `Unsupported script language "${block.lang}"` });
            }
        }
        for (const style of styles) {
            if (style.lang && !STYLE_LANGS.has(style.lang)) {
                issues.push({ block: 'style', message: `Unsupported style language "${style.lang}"` });
            }
            if (style.module) {
                issues.push({ block: 'style', message: 'CSS modules are not supported' });
            }
        }
        const sourced: Array<[IExtensionCompileIssue['block'], string | undefined]> = [
            ['template', template?.src],
            ['script', script?.src],
            ['script', scriptSetup?.src],
            ...styles.map((style): [IExtensionCompileIssue['block'], string | undefined] => ['style', style.src])
        ];
        for (const [block, src] of sourced) {
            if (src) {
                issues.push({ block, message: `External src "${src}" is not supported` });
            }
        }
    }

    /**
     * Produce the component declaration (`const __sfc__ = ...`) with its render
     * function attached. Import statements are left in place for the rewriter.
     */
    private compileComponent(
        descriptor: SFCDescriptor,
        filename: string,
        hash: string,
        hasScoped: boolean,
        issues: IExtensionCompileIssue[]
    ): string {
        const { template, script, scriptSetup } = descriptor;

        if (scriptSetup) {
            if (template) {
                this.checkTemplate(template.content, filename, hash, hasScoped, issues);
            }
            try {
                return compileScript(descriptor, {
                    id: hash,
                    inlineTemplate: true,
                    genDefaultAs: COMPONENT_BINDING
                }).content;
            } catch (error) {
                issues.push({ block: 'script', message: messageOf(error) });
                return '';
            }
        }

        const parts: string[] = [];
        let bindings: BindingMetadata | undefined;

        if (script) {
            try {
                const compiled = compileScript(descriptor, { id: hash, genDefaultAs: COMPONENT_BINDING });
                parts.push(compiled.content);
                bindings = compiled.bindings;
            } catch (error) {
                issues.push({ block: 'script', message: messageOf(error) });
                return '';
            }
        } else {
            parts.push(`const ${COMPONENT_BINDING} = {};`);
        }

        if (template) {
            const result = compileTemplate({
                source: template.content,
                filename,
                id: hash,
                scoped: hasScoped,
                compilerOptions: { bindingMetadata: bindings }
            });
            for (const error of result.errors) {
                issues.push({ block: 'template', message: messageOf(error) });
            }
            parts.push(result.code.replace(/^export function render\(/m, 'function render('));
            parts.push(`${COMPONENT_BINDING}.render = render;`);
        }

        return parts.join('\n');
    }

    /**
     * Compile a template on its own to collect errors. Inline compilation in
     * `compileScript` only warns about them.
     */
    private checkTemplate(
        source: string,
        filename: string,
        hash: string,
        hasScoped: boolean,
        issues: IExtensionCompileIssue[]
    ): void {
        const result = compileTemplate({ source, filename, id: hash, scoped: hasScoped });
        for (const error of result.errors) {
            issues.push({ block: 'template', message: messageOf(error) });
        }
    }

    private compileStyles(
        descriptor: SFCDescriptor,
        filename: string,
        hash: string,
        issues: IExtensionCompileIssue[]
    ): string {
        const chunks: string[] = [];
        for (const style of descriptor.styles) {
            const result = compileStyle({
                source: style.content,
                filename,
                id: `data-v-${hash}`,
                scoped: Boolean(style.scoped)
            });
            for (const error of result.errors) {
                issues.push({ block: 'style', message: messageOf(error) });
            }
            chunks.push(result.code.trim());
        }
        return chunks.filter(Boolean).join('\n');
    }
}
