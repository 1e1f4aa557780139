import { dirname } from 'node:path';
import { TerraceSyntaxError, errorMessage } from './errors';
import { VARIABLE_NAME } from './expression';
import { CSS_EXTENSION } from './import-resolver';
import { type Classification, type LineContext, fail, forbidChildren, nodeBase, parseScript, produced } from './context';
import type { IfNode, StyleNode } from './types';

/** An `@keyword value` line split into its parts */
export interface DirectiveLine {
    keyword: string;
    /** Text after the keyword, absent when nothing follows it */
    value?: string;
    /** Position of `value` within the trimmed line */
    column: number;
}

export type DirectiveHandler = <E>(ctx: LineContext<E>, directive: DirectiveLine) => Classification<E>;

const FOR_CLAUSES = /^(\S+)(\s+from\s+)(.+)(\s+)(to|through)(\s+)(.+)$/;
const ELSE_IF = /^if\s+(.+)/;

/** Entries of an `@import` line that are plain CSS imports */
const CSS_IMPORT = /^(url\(|")/;

/** Handlers keyed by directive keyword; other keywords become plain directives */
export const DIRECTIVE_HANDLERS: ReadonlyMap<string, DirectiveHandler> = new Map<string, DirectiveHandler>([
    ['import', (ctx, { value }) => parseImport(ctx, value)],
    ['for', (ctx, directive) => parseFor(ctx, directive)],
    ['else', (ctx, directive) => parseElse(ctx, directive)],
    ['while', (ctx, directive) => parseWhile(ctx, directive)],
    ['if', (ctx, directive) => parseIf(ctx, directive)],
    ['debug', (ctx, directive) => parseDebug(ctx, directive)],
]);

export function splitDirective(text: string): DirectiveLine {
    const body = text.slice(1);
    const gap = /\s+/.exec(body);
    if (!gap) return { keyword: body, column: text.length };
    const start = gap.index + gap[0].length;
    return { keyword: body.slice(0, gap.index), value: body.slice(start), column: start + 1 };
}

/** Dispatch an `@` line on its keyword; unknown keywords are kept verbatim */
export function classifyDirective<E>(ctx: LineContext<E>): Classification<E> {
    const directive = splitDirective(ctx.line.text);
    const handler = DIRECTIVE_HANDLERS.get(directive.keyword);
    if (handler) return handler(ctx, directive);
    return produced<E>({ type: 'directive', value: ctx.line.text, ...nodeBase<E>(ctx.line) });
}

function parseWhile<E>(ctx: LineContext<E>, { keyword, value, column }: DirectiveLine): Classification<E> {
    const expression = requireExpression(ctx, keyword, value);
    return produced<E>({ type: 'while', expression: parseScript(ctx, expression, column), ...nodeBase<E>(ctx.line) });
}

function parseIf<E>(ctx: LineContext<E>, { keyword, value, column }: DirectiveLine): Classification<E> {
    const expression = requireExpression(ctx, keyword, value);
    return produced<E>({ type: 'if', expression: parseScript(ctx, expression, column), else: null, ...nodeBase<E>(ctx.line) });
}

function parseDebug<E>(ctx: LineContext<E>, { keyword, value, column }: DirectiveLine): Classification<E> {
    const expression = requireExpression(ctx, keyword, value);
    forbidChildren(ctx, 'debug directives');
    return produced<E>({ type: 'debug', expression: parseScript(ctx, expression, column), ...nodeBase<E>(ctx.line) });
}

function requireExpression<E>(ctx: LineContext<E>, keyword: string, value: string | undefined): string {
    if (!value) fail(ctx, `Invalid ${keyword} directive '@${keyword}': expected expression.`);
    return value;
}

// =============================================================================
// @import
// =============================================================================

/**
 * Each comma-separated entry is classified on its own: `url(...)` and quoted
 * entries stay CSS imports, anything else is resolved to a stylesheet.
 */
function parseImport<E>(ctx: LineContext<E>, value: string | undefined): Classification<E> {
    if (!value) fail(ctx, "Invalid import directive '@import': expected file name.");
    forbidChildren(ctx, 'import directives');

    const nodes = value.split(/,\s*/).map((raw): StyleNode<E> => {
        const entry = raw.trim();
        if (CSS_IMPORT.test(entry)) {
            return { type: 'css-import', value: `@import ${entry}`, ...nodeBase<E>(ctx.line) };
        }

        const path = resolveImport(ctx, entry);
        if (path.endsWith(CSS_EXTENSION)) {
            return { type: 'css-import', value: `@import url(${path})`, ...nodeBase<E>(ctx.line) };
        }
        return { type: 'file-import', path, ...nodeBase<E>(ctx.line) };
    });

    return { kind: 'nodes', nodes };
}

function resolveImport<E>(ctx: LineContext<E>, name: string): string {
    const { filename, loadPaths } = ctx.env.options;
    const searchDirectories = filename ? [dirname(filename), ...loadPaths] : [...loadPaths];
    try {
        return ctx.env.collaborators.resolveImport(name, searchDirectories);
    } catch (err) {
        throw new TerraceSyntaxError(errorMessage(err), ctx.line.index);
    }
}

// =============================================================================
// @for / @else
// =============================================================================

function parseFor<E>(ctx: LineContext<E>, { value = '', column }: DirectiveLine): Classification<E> {
    const match = value.match(FOR_CLAUSES);
    if (!match) {
        let expected: string;
        if (!/^\S+/.test(value)) expected = 'variable name';
        else if (!/^\S+\s+from\s+.+/.test(value)) expected = "'from <expr>'";
        else expected = "'to <expr>' or 'through <expr>'";
        fail(ctx, `Invalid for directive '${ctx.line.text}': expected ${expected}.`);
    }

    const [, variable, fromGap, fromText, toGap, keyword, exprGap, toText] = match;
    if (!VARIABLE_NAME.test(variable)) fail(ctx, `Invalid variable "${variable}".`);

    const fromColumn = column + variable.length + fromGap.length;
    const toColumn = fromColumn + fromText.length + toGap.length + keyword.length + exprGap.length;
    return produced<E>({
        type: 'for',
        variable: variable.slice(1),
        from: parseScript(ctx, fromText, fromColumn),
        to: parseScript(ctx, toText, toColumn),
        inclusive: keyword === 'through',
        ...nodeBase<E>(ctx.line),
    });
}

/**
 * Chain an alternate branch onto the `@if` appended just before this line.
 * The branch is attached in place, so nothing is returned for the parent.
 */
function parseElse<E>(ctx: LineContext<E>, { value, column }: DirectiveLine): Classification<E> {
    const previous = ctx.parent.children[ctx.parent.children.length - 1];
    if (previous?.type !== 'if') fail(ctx, '@else must come after @if.');

    let expression: E | null = null;
    if (value) {
        const match = value.match(ELSE_IF);
        if (!match) fail(ctx, `Invalid else directive '@else ${value}': expected 'if <expr>'.`);
        expression = parseScript(ctx, match[1], column + value.length - match[1].length);
    }

    const branch: IfNode<E> = { type: 'if', expression, else: null, ...nodeBase<E>(ctx.line) };
    ctx.env.appendChildren(branch, ctx.line.children, false);

    let last: IfNode<E> = previous;
    while (last.else) last = last.else;
    last.else = branch;

    return { kind: 'none' };
}
