import { resolve } from 'node:path';
import { parseStylesheet } from '../parser/style-tree';
import type { ParseOptions } from '../parser/types';
import { type TransformState, defaultState, loadImportGraph } from './import-graph';

export interface TransformResult {
    code: string;
    map: null;
}

/**
 * Turn a `.terrace` file into an ES module exposing its AST:
 *
 *   export const imports = { "/abs/_base.terrace": { type: "root", ... } };
 *   export default { type: "root", children: [...], options: {...} };
 *
 * Every stylesheet reachable through `@import` is parsed as well, so a
 * broken partial fails the importing module too.
 */
export function transformStylesheetModule(code: string, id: string, state: TransformState = defaultState, options: ParseOptions = {}): TransformResult {
    const filename = resolve(id);
    const root = parseStylesheet(code, { ...options, filename });
    state.stylesheetCache.set(filename, root);

    const graph = loadImportGraph(filename, state, options);
    const imports = Object.fromEntries([...graph].filter(([path]) => path !== filename));

    return {
        code: `export const imports = ${JSON.stringify(imports)};\nexport default ${JSON.stringify(root)};\n`,
        map: null,
    };
}
