export { parseStylesheet, parseStylesheetWith, isContinued, DEFAULT_COLLABORATORS } from './parser/style-tree';
export { tokenize, humanIndentation } from './parser/tokenizer';
export { buildLineTree } from './parser/line-tree';
export { classifyLine, LINE_HANDLERS } from './parser/line-classifier';
export { classifyDirective, DIRECTIVE_HANDLERS } from './parser/directives';
export { parseRawExpression, VARIABLE_CHAR } from './parser/expression';
export { findFileToImport, STYLESHEET_EXTENSION, CSS_EXTENSION } from './parser/import-resolver';
export { DEFAULT_OPTIONS, resolveOptions } from './parser/options';
export { TerraceSyntaxError } from './parser/errors';
export { createTransformState, loadImportGraph, collectFileImports, clearStylesheetCache, getImportDependents } from './transform/import-graph';
export type { TransformState } from './transform/import-graph';
export { transformStylesheetModule } from './transform/module';
export type * from './parser/types';
