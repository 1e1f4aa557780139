import type { RawExpression } from './types';

/** Leading character of a variable reference */
export const VARIABLE_CHAR = '!';

/** `!name = value` / `!name ||= value` */
export const VARIABLE_BINDING = /^!([a-zA-Z_]\w*)\s*((?:\|\|)?=)\s*(.+)/;

/** A bare variable reference such as `!width` */
export const VARIABLE_NAME = /^![a-zA-Z_]\w*$/;

const CLOSERS: Record<string, string> = { ')': '(', ']': '[' };

/**
 * Pass-through expression collaborator.
 *
 * Keeps the expression text for the evaluation stage after checking that it
 * is non-empty, its brackets balance and its strings are terminated.
 */
export function parseRawExpression(text: string, line: number, offset: number, filename?: string): RawExpression {
    const trimmed = text.trim();
    if (!trimmed) throw new Error('Expected expression.');

    const stack: string[] = [];
    let quote: string | undefined;
    for (let i = 0; i < trimmed.length; i++) {
        const ch = trimmed[i];
        if (quote) {
            if (ch === '\\') i++;
            else if (ch === quote) quote = undefined;
        } else if (ch === '"' || ch === "'") {
            quote = ch;
        } else if (ch === '(' || ch === '[') {
            stack.push(ch);
        } else if (ch in CLOSERS) {
            if (stack.pop() !== CLOSERS[ch]) {
                throw new Error(`Unexpected "${ch}" in expression "${trimmed}".`);
            }
        }
    }
    if (quote) throw new Error(`Unterminated string in expression "${trimmed}".`);
    if (stack.length > 0) throw new Error(`Unclosed "${stack[stack.length - 1]}" in expression "${trimmed}".`);

    return { type: 'raw', text: trimmed, line, offset, filename };
}
