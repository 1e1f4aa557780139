import { classifyDirective } from './directives';
import { VARIABLE_BINDING, VARIABLE_CHAR, VARIABLE_NAME } from './expression';
import { type Classification, type LineContext, fail, forbidChildren, nodeBase, parseScript, produced } from './context';
import type { LogicalLine, MixinArgument } from './types';

/** `:name value` or `:name= expr` */
export const ATTRIBUTE = /^:([^\s=:"]+)\s*(=?)(?:\s+|$)(.*)/;

/** Decides whether a plain line is an inline attribute rather than a rule */
export const ATTRIBUTE_INLINE_MATCHER = /^[^\s:"]+\s*[=:](\s|$)/;

/** `name: value` or `name = expr` */
export const ATTRIBUTE_INLINE = /^([^\s=:"]+)(\s*=|:)(?:\s+|$)(.*)/;

const MIXIN_DEFINITION = /^=\s*([^(]+)(.*)$/;
const MIXIN_INCLUDE = /^\+\s*([^(]+)(.*)$/;

/** Marks an attribute value as an expression */
const SCRIPT_CHAR = '=';

export type LineHandler = <E>(ctx: LineContext<E>) => Classification<E>;

/**
 * Handlers keyed by the first character of a line. Lines whose first
 * character has no entry go through `classifyPlainLine`.
 */
export const LINE_HANDLERS: Readonly<Record<string, LineHandler>> = {
    ':': (ctx) => {
        // `::before` and friends are selectors, not attributes
        if (ctx.line.text[1] === ':') return rule(ctx, ctx.line.text);
        return parseAttribute(ctx, ATTRIBUTE, 'prefixed');
    },
    [VARIABLE_CHAR]: (ctx) => parseVariable(ctx),
    '/': (ctx) => parseComment(ctx),
    '@': (ctx) => classifyDirective(ctx),
    '\\': (ctx) => rule(ctx, ctx.line.text.slice(1)),
    '=': (ctx) => parseMixinDefinition(ctx),
    '+': (ctx) => {
        if (ctx.line.text.length === 1) return rule(ctx, ctx.line.text);
        return parseMixinInclude(ctx);
    },
};

/** Classify one line by its leading character */
export function classifyLine<E>(ctx: LineContext<E>): Classification<E> {
    const handler = LINE_HANDLERS[ctx.line.text[0]];
    return handler ? handler(ctx) : classifyPlainLine(ctx);
}

export function classifyPlainLine<E>(ctx: LineContext<E>): Classification<E> {
    if (ATTRIBUTE_INLINE_MATCHER.test(ctx.line.text)) return parseAttribute(ctx, ATTRIBUTE_INLINE, 'inline');
    return rule(ctx, ctx.line.text);
}

function rule<E>(ctx: LineContext<E>, selector: string): Classification<E> {
    return produced<E>({ type: 'rule', rules: [selector], ...nodeBase<E>(ctx.line) });
}

function parseAttribute<E>(ctx: LineContext<E>, pattern: RegExp, syntax: 'prefixed' | 'inline'): Classification<E> {
    const { text } = ctx.line;
    const match = text.match(pattern);
    if (!match) fail(ctx, `Invalid attribute: "${text}".`);

    const [, name, marker, value] = match;
    const isScript = marker.trim()[0] === SCRIPT_CHAR;
    return produced<E>({
        type: 'attribute',
        name,
        // the value capture runs to the end of the line
        value: isScript ? parseScript(ctx, value, text.length - value.length) : value,
        syntax,
        ...nodeBase<E>(ctx.line),
    });
}

function parseVariable<E>(ctx: LineContext<E>): Classification<E> {
    const { text } = ctx.line;
    forbidChildren(ctx, 'variable declarations');
    const match = text.match(VARIABLE_BINDING);
    if (!match) fail(ctx, `Invalid variable: "${text}".`);

    const [, name, operator, value] = match;
    return produced<E>({
        type: 'variable',
        name,
        expression: parseScript(ctx, value, text.length - value.length),
        guarded: operator === '||=',
        ...nodeBase<E>(ctx.line),
    });
}

/**
 * `//` starts a silent comment and `/*` a loud one. Lines nested under a
 * comment are its body and are never classified.
 */
function parseComment<E>(ctx: LineContext<E>): Classification<E> {
    const { text } = ctx.line;
    if (text[1] !== '/' && text[1] !== '*') return rule(ctx, text);
    return produced<E>({
        type: 'comment',
        value: text,
        silent: text[1] === '/',
        lines: flattenText(ctx.line.children),
        ...nodeBase<E>(ctx.line),
    });
}

function flattenText(lines: LogicalLine[]): string[] {
    return lines.flatMap((line) => [line.text, ...flattenText(line.children)]);
}

// =============================================================================
// Mixins
// =============================================================================

export interface ArgumentText {
    text: string;
    /** Position of `text` within the trimmed line */
    column: number;
}

function parseMixinDefinition<E>(ctx: LineContext<E>): Classification<E> {
    const { text } = ctx.line;
    const match = text.match(MIXIN_DEFINITION);
    const args = match ? splitMixinArguments(match[2], text.length - match[2].length) : null;
    if (!match || !args) fail(ctx, `Invalid mixin "${text.slice(1)}".`);

    let defaultFound = false;
    const parsed: MixinArgument<E>[] = args.map((arg) => {
        if (!arg.text || arg.text === VARIABLE_CHAR) fail(ctx, "Mixin arguments can't be empty.");
        if (!arg.text.startsWith(VARIABLE_CHAR)) {
            fail(ctx, `Mixin argument "${arg.text}" must begin with an exclamation point (${VARIABLE_CHAR}).`);
        }

        const eq = /\s*=\s*/.exec(arg.text);
        const name = eq ? arg.text.slice(0, eq.index) : arg.text;
        const defaultText = eq ? arg.text.slice(eq.index + eq[0].length) : undefined;
        if (defaultText !== undefined) defaultFound = true;

        if (!VARIABLE_NAME.test(name)) fail(ctx, `Invalid variable "${name}".`);
        if (defaultFound && defaultText === undefined) {
            fail(ctx, `Required arguments must not follow optional arguments "${name}".`);
        }

        return {
            name: name.slice(1),
            defaultValue: eq && defaultText !== undefined ? parseScript(ctx, defaultText, arg.column + eq.index + eq[0].length) : null,
        };
    });

    return produced<E>({ type: 'mixin-def', name: match[1].trim(), args: parsed, ...nodeBase<E>(ctx.line) });
}

function parseMixinInclude<E>(ctx: LineContext<E>): Classification<E> {
    const { text } = ctx.line;
    const match = text.match(MIXIN_INCLUDE);
    const args = match ? splitMixinArguments(match[2], text.length - match[2].length) : null;
    forbidChildren(ctx, 'mixin directives');
    if (!match || !args) fail(ctx, `Invalid mixin include "${text}".`);

    for (const arg of args) {
        if (!arg.text) fail(ctx, "Mixin arguments can't be empty.");
    }

    return produced<E>({
        type: 'mixin',
        name: match[1].trim(),
        args: args.map((arg) => parseScript(ctx, arg.text, arg.column)),
        ...nodeBase<E>(ctx.line),
    });
}

/**
 * Split a mixin argument list such as `(!a, !b = 2)`.
 *
 * Returns `null` when the text is neither empty nor parenthesized. Commas
 * inside nested brackets or strings do not split. Empty entries (including
 * a trailing one) are kept so callers can reject them.
 */
export function splitMixinArguments(argString: string, column: number): ArgumentText[] | null {
    const trimmed = argString.trim();
    if (!trimmed) return [];
    if (!trimmed.startsWith('(') || !trimmed.endsWith(')')) return null;

    const innerStart = column + (argString.length - argString.trimStart().length) + 1;
    const inner = trimmed.slice(1, -1);
    if (!inner) return [];

    const args: ArgumentText[] = [];
    let depth = 0;
    let quote: string | undefined;
    let start = 0;
    const push = (end: number) => {
        const piece = inner.slice(start, end);
        const lead = piece.length - piece.trimStart().length;
        args.push({ text: piece.trim(), column: innerStart + start + lead });
    };

    for (let i = 0; i < inner.length; i++) {
        const ch = inner[i];
        if (quote) {
            if (ch === '\\') i++;
            else if (ch === quote) quote = undefined;
        } else if (ch === '"' || ch === "'") {
            quote = ch;
        } else if (ch === '(' || ch === '[') {
            depth++;
        } else if (ch === ')' || ch === ']') {
            depth--;
        } else if (ch === ',' && depth === 0) {
            push(i);
            start = i + 1;
        }
    }
    push(inner.length);

    return args;
}
