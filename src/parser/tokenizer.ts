import { TerraceSyntaxError } from './errors';
import type { LogicalLine } from './types';

const BOM = /^\uFEFF/;

/** Only spaces and tabs indent; other Unicode spaces belong to the line text */
const INDENTATION = /^[ \t]*/;
const TRAILING_SPACE = /[ \t\f\v]+$/;

/**
 * Split source text into logical lines, measuring each line's depth in
 * indentation units.
 *
 * The first leading whitespace in the document fixes the unit; every later
 * indented line must repeat it exactly. Blank lines are dropped and never
 * count towards indentation errors.
 */
export function tokenize(source: string, startLine = 1, filename?: string): LogicalLine[] {
    const lines: LogicalLine[] = [];
    let unit: string | undefined;
    let first = true;

    const physical = source.replace(BOM, '').replace(/\r\n|\r/g, '\n').split('\n');
    for (let i = 0; i < physical.length; i++) {
        const raw = physical[i];
        const index = i + startLine;
        const leading = raw.match(INDENTATION)?.[0] ?? '';
        const text = raw.slice(leading.length).replace(TRAILING_SPACE, '');
        if (!text) continue;

        if (leading) {
            if (first) {
                throw new TerraceSyntaxError('Indenting at the beginning of the document is illegal.', index);
            }
            if (unit === undefined) {
                unit = leading;
                if (new Set(unit).size > 1) {
                    throw new TerraceSyntaxError("Indentation can't use both tabs and spaces.", index);
                }
            }
        }
        first = false;

        lines.push({
            text,
            depth: measureDepth(leading, unit, index),
            index,
            offset: leading.length,
            filename,
            children: [],
        });
    }

    return lines;
}

function measureDepth(leading: string, unit: string | undefined, index: number): number {
    if (!leading || unit === undefined) return 0;
    const depth = Math.floor(leading.length / unit.length);
    if (unit.repeat(depth) !== leading) {
        throw new TerraceSyntaxError(
            `Inconsistent indentation: ${humanIndentation(leading, true)} used for indentation, ` +
                `but the rest of the document was indented using ${humanIndentation(unit)}.`,
            index,
        );
    }
    return depth;
}

/**
 * Describe whitespace for error messages: "2 spaces", "1 tab was",
 * or the quoted string when tabs and spaces are mixed.
 */
export function humanIndentation(indentation: string, was = false): string {
    let noun: string;
    if (!indentation.includes('\t')) {
        noun = 'space';
    } else if (!indentation.includes(' ')) {
        noun = 'tab';
    } else {
        return JSON.stringify(indentation) + (was ? ' was' : '');
    }

    const singular = indentation.length === 1;
    const verb = was ? (singular ? ' was' : ' were') : '';
    return `${indentation.length} ${noun}${singular ? '' : 's'}${verb}`;
}
