/** One non-blank physical source line, reduced to its text and nesting depth */
export interface LogicalLine {
    /** Trimmed line text */
    text: string;
    /** Number of indentation units in front of the text */
    depth: number;
    /** 1-based source line number */
    index: number;
    /** Column where the trimmed text starts in the physical line */
    offset: number;
    filename?: string;
    /** Nested lines (filled in by the line-tree builder) */
    children: LogicalLine[];
}

/** Output formatting mode, forwarded untouched to the evaluation stage */
export type OutputStyle = 'nested' | 'expanded' | 'compact' | 'compressed';

export interface ParseOptions {
    style?: OutputStyle;
    /** Ordered import search directories */
    loadPaths?: string[];
    /** Cache directory for compiled output (not used by the parser) */
    precompiledLocation?: string;
    /** Source filename, used in diagnostics and for relative imports */
    filename?: string;
    /** Line number of the first source line, for embedded fragments */
    line?: number;
}

export interface ResolvedOptions {
    style: OutputStyle;
    loadPaths: string[];
    precompiledLocation: string;
    filename?: string;
    line?: number;
}

/** Default output of the pass-through expression collaborator */
export interface RawExpression {
    type: 'raw';
    text: string;
    line: number;
    offset: number;
    filename?: string;
}

export type ExpressionParser<E> = (text: string, line: number, offset: number, filename?: string) => E;

export type ImportResolver = (name: string, searchDirectories: readonly string[]) => string;

export interface ParserCollaborators<E> {
    parseExpression: ExpressionParser<E>;
    resolveImport: ImportResolver;
}

// =============================================================================
// AST
// =============================================================================

interface NodeBase<E> {
    line: number;
    filename?: string;
    children: StyleNode<E>[];
}

export interface RuleNode<E = RawExpression> extends NodeBase<E> {
    type: 'rule';
    /** Selector texts; more than one after comma continuation */
    rules: string[];
}

export interface AttributeNode<E = RawExpression> extends NodeBase<E> {
    type: 'attribute';
    name: string;
    /** Literal text, or a parsed expression for `=` attributes */
    value: string | E;
    /** `:name value` is prefixed, `name: value` is inline */
    syntax: 'prefixed' | 'inline';
}

export interface CommentNode<E = RawExpression> extends NodeBase<E> {
    type: 'comment';
    /** First line of the comment, including the `//` or `/*` lead */
    value: string;
    /** `//` comments are never emitted */
    silent: boolean;
    /** Nested body lines, depth-first */
    lines: string[];
}

export interface DirectiveNode<E = RawExpression> extends NodeBase<E> {
    type: 'directive';
    value: string;
}

export interface VariableNode<E = RawExpression> extends NodeBase<E> {
    type: 'variable';
    name: string;
    expression: E;
    /** `||=`: only assign when the variable is unbound */
    guarded: boolean;
}

export interface MixinArgument<E = RawExpression> {
    name: string;
    defaultValue: E | null;
}

export interface MixinDefNode<E = RawExpression> extends NodeBase<E> {
    type: 'mixin-def';
    name: string;
    args: MixinArgument<E>[];
}

export interface MixinNode<E = RawExpression> extends NodeBase<E> {
    type: 'mixin';
    name: string;
    args: E[];
}

export interface IfNode<E = RawExpression> extends NodeBase<E> {
    type: 'if';
    /** `null` only for a plain `@else` branch */
    expression: E | null;
    else: IfNode<E> | null;
}

export interface WhileNode<E = RawExpression> extends NodeBase<E> {
    type: 'while';
    expression: E;
}

export interface ForNode<E = RawExpression> extends NodeBase<E> {
    type: 'for';
    variable: string;
    from: E;
    to: E;
    /** `through` includes the upper bound, `to` excludes it */
    inclusive: boolean;
}

export interface DebugNode<E = RawExpression> extends NodeBase<E> {
    type: 'debug';
    expression: E;
}

/** A stylesheet import, parsed later by the caller */
export interface FileImportNode<E = RawExpression> extends NodeBase<E> {
    type: 'file-import';
    /** Absolute path of the imported stylesheet */
    path: string;
}

/** A plain CSS `@import`, emitted verbatim */
export interface CssImportNode<E = RawExpression> extends NodeBase<E> {
    type: 'css-import';
    value: string;
}

export type StyleNode<E = RawExpression> =
    | RuleNode<E>
    | AttributeNode<E>
    | CommentNode<E>
    | DirectiveNode<E>
    | VariableNode<E>
    | MixinDefNode<E>
    | MixinNode<E>
    | IfNode<E>
    | WhileNode<E>
    | ForNode<E>
    | DebugNode<E>
    | FileImportNode<E>
    | CssImportNode<E>;

export type StyleNodeType = StyleNode['type'];

export interface RootNode<E = RawExpression> {
    type: 'root';
    children: StyleNode<E>[];
    options: ResolvedOptions;
}

/** Anything nodes can be appended to */
export type ParentNode<E = RawExpression> = RootNode<E> | StyleNode<E>;

/** Hand-off contract for the evaluation stage */
export interface Evaluator<E = RawExpression> {
    evaluate(root: RootNode<E>, environment: Map<string, unknown>): string;
}
