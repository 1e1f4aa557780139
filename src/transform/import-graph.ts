import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { TerraceSyntaxError } from '../parser/errors';
import { parseStylesheet } from '../parser/style-tree';
import type { FileImportNode, ParseOptions, RootNode } from '../parser/types';

/**
 * Per-instance state for the stylesheet cache and import tracking.
 * Each Vite plugin instance creates its own so SSR client/server builds
 * running in one Node process don't share stale entries.
 */
export interface TransformState {
    /** Parsed stylesheets by absolute path */
    stylesheetCache: Map<string, RootNode>;
    /** Absolute path → absolute paths it imports directly */
    importDeps: Map<string, Set<string>>;
}

export function createTransformState(): TransformState {
    return {
        stylesheetCache: new Map(),
        importDeps: new Map(),
    };
}

/** State shared by every caller that does not pass its own */
export const defaultState: TransformState = createTransformState();

/** `@import` targets that still have to be parsed, in source order */
export function collectFileImports<E>(root: RootNode<E>): FileImportNode<E>[] {
    const imports: FileImportNode<E>[] = [];
    for (const node of root.children) {
        if (node.type === 'file-import') imports.push(node);
    }
    return imports;
}

/**
 * Invalidate the cached AST of one file, or clear the whole cache.
 * Called by the Vite plugin on HMR updates.
 */
export function clearStylesheetCache(filePath?: string, state: TransformState = defaultState): void {
    if (filePath) {
        state.stylesheetCache.delete(resolve(filePath));
    } else {
        state.stylesheetCache.clear();
    }
}

/**
 * Get every file that imports the given file, directly or through other
 * imports. Used by the Vite plugin for HMR propagation.
 */
export function getImportDependents(providerPath: string, state: TransformState = defaultState): string[] {
    const dependents: string[] = [];
    const start = resolve(providerPath);
    const pending = [start];
    for (let provider = pending.pop(); provider !== undefined; provider = pending.pop()) {
        for (const [consumer, providers] of state.importDeps) {
            if (consumer !== start && providers.has(provider) && !dependents.includes(consumer)) {
                dependents.push(consumer);
                pending.push(consumer);
            }
        }
    }
    return dependents;
}

/**
 * Parse `entryPath` and every stylesheet it imports, transitively.
 *
 * Returns the parsed files keyed by absolute path, entry first. Import
 * cycles are reported and not followed.
 */
export function loadImportGraph(entryPath: string, state: TransformState = defaultState, options: ParseOptions = {}): Map<string, RootNode> {
    const graph = new Map<string, RootNode>();
    visit(resolve(entryPath), [], undefined);
    return graph;

    function visit(path: string, stack: string[], importedBy: FileImportNode | undefined): void {
        if (stack.includes(path)) {
            const loc = importedBy ? ` (${importedBy.filename}:${importedBy.line})` : '';
            console.warn(`[terrace]${loc} Circular @import: ${[...stack, path].join(' -> ')}. Skipping.`);
            return;
        }
        if (graph.has(path)) return;

        const root = loadStylesheet(path, state, options, importedBy);
        graph.set(path, root);

        const imports = collectFileImports(root);
        state.importDeps.set(path, new Set(imports.map((node) => node.path)));
        for (const node of imports) {
            visit(node.path, [...stack, path], node);
        }
    }
}

/**
 * Read and parse one stylesheet, going through the cache.
 */
function loadStylesheet(path: string, state: TransformState, options: ParseOptions, importedBy: FileImportNode | undefined): RootNode {
    const cached = state.stylesheetCache.get(path);
    if (cached) return cached;

    let source: string;
    try {
        source = readFileSync(path, 'utf-8');
    } catch {
        throw new TerraceSyntaxError(`Could not read file: ${path}`, importedBy?.line ?? 1, importedBy?.filename);
    }

    const root = parseStylesheet(source, { ...options, filename: path, line: undefined });
    state.stylesheetCache.set(path, root);
    return root;
}
