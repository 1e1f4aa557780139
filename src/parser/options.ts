import type { ParseOptions, ResolvedOptions } from './types';

export const DEFAULT_OPTIONS: Readonly<ResolvedOptions> = Object.freeze({
    style: 'nested',
    loadPaths: ['.'],
    precompiledLocation: './.terrace-cache',
});

/**
 * Merge caller options over the defaults. Explicit `undefined` values fall
 * back to the default rather than erasing it.
 */
export function resolveOptions(options: ParseOptions = {}): ResolvedOptions {
    return {
        style: options.style ?? DEFAULT_OPTIONS.style,
        loadPaths: [...(options.loadPaths ?? DEFAULT_OPTIONS.loadPaths)],
        precompiledLocation: options.precompiledLocation ?? DEFAULT_OPTIONS.precompiledLocation,
        filename: options.filename,
        line: options.line,
    };
}
