import { accessSync, constants, statSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';

/** Extension of Terrace stylesheets */
export const STYLESHEET_EXTENSION = '.terrace';

/** Imports of plain CSS are passed through to the output untouched */
export const CSS_EXTENSION = '.css';

/**
 * Default import collaborator: find the stylesheet `name` refers to.
 *
 * `.css` names come back unchanged. Other names are looked up with the
 * `.terrace` extension in each directory in order, trying the partial form
 * (`_name.terrace`) before the plain one.
 */
export function findFileToImport(name: string, searchDirectories: readonly string[]): string {
    if (name.endsWith(CSS_EXTENSION)) return name;

    const filename = name.endsWith(STYLESHEET_EXTENSION) ? name : name + STYLESHEET_EXTENSION;
    const partial = join(dirname(filename), `_${basename(filename)}`);

    for (const dir of searchDirectories) {
        for (const candidate of [partial, filename]) {
            const fullPath = resolve(dir, candidate);
            if (isReadableFile(fullPath)) return fullPath;
        }
    }

    throw new Error(`File to import not found or unreadable: ${name}.`);
}

function isReadableFile(path: string): boolean {
    try {
        accessSync(path, constants.R_OK);
        return statSync(path).isFile();
    } catch {
        return false;
    }
}
