import { TerraceSyntaxError, errorMessage } from './errors';
import type { LogicalLine, ParentNode, ParserCollaborators, ResolvedOptions, StyleNode } from './types';

/** Per-document parse state shared by every line handler */
export interface ParseEnv<E> {
    options: ResolvedOptions;
    collaborators: ParserCollaborators<E>;
    /** Classify `lines` and append the results to `parent` */
    appendChildren(parent: ParentNode<E>, lines: LogicalLine[], root: boolean): void;
}

/**
 * Everything a handler knows about the line it is classifying.
 * The line itself is the "current line" every diagnostic is stamped with.
 */
export interface LineContext<E> {
    env: ParseEnv<E>;
    line: LogicalLine;
    /** Node the result will be appended to */
    parent: ParentNode<E>;
    /** Whether `parent` is the document root */
    root: boolean;
}

/** Outcome of classifying one line */
export type Classification<E> = { kind: 'node'; node: StyleNode<E> } | { kind: 'nodes'; nodes: StyleNode<E>[] } | { kind: 'none' };

export function produced<E>(node: StyleNode<E>): Classification<E> {
    return { kind: 'node', node };
}

export function nodeBase<E>(line: LogicalLine): { line: number; filename?: string; children: StyleNode<E>[] } {
    return { line: line.index, filename: line.filename, children: [] };
}

export function fail<E>(ctx: LineContext<E>, message: string, line: number = ctx.line.index): never {
    throw new TerraceSyntaxError(message, line);
}

/** Children are illegal under some constructs; report on the first nested line */
export function forbidChildren<E>(ctx: LineContext<E>, what: string): void {
    const nested = ctx.line.children[0];
    if (nested) fail(ctx, `Illegal nesting: Nothing may be nested beneath ${what}.`, nested.index);
}

/**
 * Hand `text` to the expression collaborator.
 * `column` is the position of `text` within the trimmed line. Any failure
 * is reported on the current line.
 */
export function parseScript<E>(ctx: LineContext<E>, text: string, column: number): E {
    try {
        return ctx.env.collaborators.parseExpression(text, ctx.line.index, ctx.line.offset + column, ctx.line.filename);
    } catch (err) {
        throw new TerraceSyntaxError(errorMessage(err), ctx.line.index);
    }
}
