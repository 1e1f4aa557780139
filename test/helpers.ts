import { TerraceSyntaxError } from '../src/parser/errors';
import type { LogicalLine } from '../src/parser/types';

/** Run `fn` and return the TerraceSyntaxError it throws */
export function catchSyntaxError(fn: () => unknown): TerraceSyntaxError {
    try {
        fn();
    } catch (err) {
        if (err instanceof TerraceSyntaxError) return err;
        throw err;
    }
    throw new Error('Expected a TerraceSyntaxError');
}

/** Count lines across a structured line tree */
export function countLines(lines: LogicalLine[]): number {
    return lines.reduce((sum, line) => sum + 1 + countLines(line.children), 0);
}
