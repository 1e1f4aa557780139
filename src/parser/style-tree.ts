import { TerraceSyntaxError } from './errors';
import { parseRawExpression } from './expression';
import { findFileToImport } from './import-resolver';
import { buildLineTree } from './line-tree';
import { classifyLine } from './line-classifier';
import { resolveOptions } from './options';
import { tokenize } from './tokenizer';
import type { Classification, ParseEnv } from './context';
import type { LogicalLine, ParentNode, ParseOptions, ParserCollaborators, RawExpression, RootNode, RuleNode, StyleNode } from './types';

export const DEFAULT_COLLABORATORS: ParserCollaborators<RawExpression> = {
    parseExpression: parseRawExpression,
    resolveImport: findFileToImport,
};

/**
 * Parse a Terrace stylesheet into its AST:
 *
 *   !accent = #c00
 *   a
 *     :color= !accent
 *     +rounded(4px)
 *
 * Lines are tokenized by indentation, nested into a line tree, then each
 * line is classified into AST nodes and validated on the way. The first
 * violation aborts the whole parse with a `TerraceSyntaxError`.
 */
export function parseStylesheet(source: string, options: ParseOptions = {}): RootNode {
    return parseStylesheetWith(source, options, DEFAULT_COLLABORATORS);
}

/**
 * Same as `parseStylesheet`, with caller-supplied expression parsing and
 * import lookup.
 */
export function parseStylesheetWith<E>(source: string, options: ParseOptions, collaborators: ParserCollaborators<E>): RootNode<E> {
    const resolved = resolveOptions(options);
    const root: RootNode<E> = { type: 'root', children: [], options: resolved };
    const env: ParseEnv<E> = {
        options: resolved,
        collaborators,
        appendChildren: (parent, lines, isRoot) => appendChildren(env, parent, lines, isRoot),
    };

    try {
        const lines = tokenize(source, resolved.line ?? 1, resolved.filename);
        appendChildren(env, root, buildLineTree(lines).nodes, true);
    } catch (err) {
        if (err instanceof TerraceSyntaxError) throw err.addMetadata(resolved.filename);
        throw err;
    }
    return root;
}

/** A rule whose selector ends in a comma continues on the next line */
export function isContinued<E>(rule: RuleNode<E>): boolean {
    return rule.rules[rule.rules.length - 1].endsWith(',');
}

/**
 * Classify `lines` and append the results to `parent`, merging comma-continued
 * rules into the rule that ends them.
 */
function appendChildren<E>(env: ParseEnv<E>, parent: ParentNode<E>, lines: LogicalLine[], root: boolean): void {
    let continued: RuleNode<E> | undefined;

    for (const line of lines) {
        const result = buildNode(env, parent, line, root);
        const child = result.kind === 'node' ? result.node : undefined;

        if (child?.type === 'rule' && isContinued(child)) {
            if (child.children.length > 0) throw new TerraceSyntaxError("Rules can't end in commas.", child.line);
            if (continued) continued.rules.push(...child.rules);
            else continued = child;
            continue;
        }

        if (continued) {
            if (child?.type !== 'rule') throw new TerraceSyntaxError("Rules can't end in commas.", continued.line);
            continued.rules.push(...child.rules);
            continued.children = child.children;
            appendChild(parent, continued, line, root);
            continued = undefined;
            continue;
        }

        appendResult(parent, result, line, root);
    }

    if (continued) throw new TerraceSyntaxError("Rules can't end in commas.", continued.line);
}

function buildNode<E>(env: ParseEnv<E>, parent: ParentNode<E>, line: LogicalLine, root: boolean): Classification<E> {
    const result = classifyLine({ env, line, parent, root });
    // comment bodies were captured as text by the classifier
    if (result.kind === 'node' && result.node.type !== 'comment') {
        appendChildren(env, result.node, line.children, false);
    }
    return result;
}

function appendResult<E>(parent: ParentNode<E>, result: Classification<E>, line: LogicalLine, root: boolean): void {
    switch (result.kind) {
        case 'node':
            appendChild(parent, result.node, line, root);
            break;
        case 'nodes':
            for (const node of result.nodes) appendChild(parent, node, line, root);
            break;
        case 'none':
            break;
    }
}

/** Mixin definitions and imports are only legal at the top of a document */
function appendChild<E>(parent: ParentNode<E>, child: StyleNode<E>, line: LogicalLine, root: boolean): void {
    if (!root) {
        switch (child.type) {
            case 'mixin-def':
                throw new TerraceSyntaxError('Mixins may only be defined at the root of a document.', line.index);
            case 'file-import':
            case 'css-import':
                throw new TerraceSyntaxError('Import directives may only be used at the root of a document.', line.index);
        }
    }
    parent.children.push(child);
}
