import type { Plugin } from 'vite';
import { TerraceSyntaxError, errorMessage } from './parser/errors';
import { STYLESHEET_EXTENSION } from './parser/import-resolver';
import type { OutputStyle } from './parser/types';
import { clearStylesheetCache, createTransformState, getImportDependents } from './transform/import-graph';
import { transformStylesheetModule } from './transform/module';

export interface TerracePluginOptions {
    /** Import search directories, after the importing file's own directory */
    loadPaths?: string[];
    style?: OutputStyle;
}

/** The parts of Vite's module graph the HMR hook touches */
export interface HotModuleGraph<M> {
    getModulesByFile(file: string): Set<M> | undefined;
    invalidateModule(mod: M): void;
}

export interface HotUpdate<M> {
    file: string;
    modules: M[];
    server: { moduleGraph: HotModuleGraph<M> };
}

const stripQuery = (id: string) => id.replace(/\?.*$/, '');

export function terracePlugin(options: TerracePluginOptions = {}) {
    // caches live per instance: dev server and SSR build may share a process
    const state = createTransformState();

    return {
        name: 'terrace',
        enforce: 'pre',

        transform(this: void, code: string, id: string) {
            const file = stripQuery(id);
            if (!file.endsWith(STYLESHEET_EXTENSION)) return null;

            try {
                return transformStylesheetModule(code, file, state, options);
            } catch (err) {
                const loc = err instanceof TerraceSyntaxError ? err.location : '';
                console.error(`[terrace]${loc} Parse failed for ${id}: ${errorMessage(err)}`);
                throw err;
            }
        },

        handleHotUpdate<M>({ file, server, modules }: HotUpdate<M>): M[] | undefined {
            const changed = stripQuery(file);
            if (!changed.endsWith(STYLESHEET_EXTENSION)) return undefined;

            clearStylesheetCache(changed, state);

            // importers inline the changed AST in their own module
            const importers = getImportDependents(changed, state);
            if (importers.length === 0) return undefined;

            const affected = new Set(modules);
            for (const importer of importers) {
                for (const mod of server.moduleGraph.getModulesByFile(importer) ?? []) {
                    server.moduleGraph.invalidateModule(mod);
                    affected.add(mod);
                }
            }
            return [...affected];
        },
    } satisfies Plugin;
}
