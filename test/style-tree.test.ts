import { describe, it, expect } from 'vitest';
import { parseStylesheet, DEFAULT_COLLABORATORS } from '../src/parser/style-tree';
import { classifyLine, LINE_HANDLERS } from '../src/parser/line-classifier';
import { resolveOptions } from '../src/parser/options';
import type { ParseEnv } from '../src/parser/context';
import type { RawExpression, RootNode, StyleNode } from '../src/parser/types';
import { catchSyntaxError } from './helpers';

function only(root: RootNode): StyleNode {
    expect(root.children).toHaveLength(1);
    return root.children[0];
}

describe('parseStylesheet: rules and attributes', () => {
    it('parses a rule with a prefixed attribute', () => {
        const root = parseStylesheet('a\n  :color red\n');
        expect(root.type).toBe('root');
        expect(only(root)).toEqual({
            type: 'rule',
            rules: ['a'],
            line: 1,
            children: [{ type: 'attribute', name: 'color', value: 'red', syntax: 'prefixed', line: 2, children: [] }],
        });
    });

    it('parses inline attributes', () => {
        const rule = only(parseStylesheet('a\n  color: red\n  margin:'));
        expect(rule.children).toEqual([
            { type: 'attribute', name: 'color', value: 'red', syntax: 'inline', line: 2, children: [] },
            { type: 'attribute', name: 'margin', value: '', syntax: 'inline', line: 3, children: [] },
        ]);
    });

    it('parses attribute expressions with their column', () => {
        const rule = only(parseStylesheet('a\n  width = !w + 2\n  :height= 10px'));
        const [width, height] = rule.children;
        expect(width).toMatchObject({ type: 'attribute', name: 'width', syntax: 'inline' });
        expect(width.type === 'attribute' && width.value).toEqual({ type: 'raw', text: '!w + 2', line: 2, offset: 10 });
        expect(height.type === 'attribute' && height.value).toEqual({ type: 'raw', text: '10px', line: 3, offset: 11 });
    });

    it('keeps nested attribute namespaces', () => {
        const rule = only(parseStylesheet('a\n  :font\n    :family serif'));
        expect(rule.children[0]).toMatchObject({ type: 'attribute', name: 'font', value: '' });
        expect(rule.children[0].children[0]).toMatchObject({ type: 'attribute', name: 'family', value: 'serif' });
    });

    it('treats pseudo-classes and pseudo-elements as selectors', () => {
        const root = parseStylesheet('a:hover\n  ::before\n    :content "x"');
        const rule = only(root);
        expect(rule).toMatchObject({ type: 'rule', rules: ['a:hover'] });
        expect(rule.children[0]).toMatchObject({ type: 'rule', rules: ['::before'] });
    });

    it('reads `name: value` as an attribute even when it looks like a selector', () => {
        expect(only(parseStylesheet('div: hover'))).toMatchObject({ type: 'attribute', name: 'div', value: 'hover', syntax: 'inline' });
    });

    it('rejects malformed prefixed attributes', () => {
        const err = catchSyntaxError(() => parseStylesheet('a\n  :color=red'));
        expect(err.message).toBe('Invalid attribute: ":color=red".');
        expect(err.line).toBe(2);
    });

    it('escapes a line with a backslash', () => {
        expect(only(parseStylesheet('\\+plus'))).toMatchObject({ type: 'rule', rules: ['+plus'] });
        expect(only(parseStylesheet('\\=equals'))).toMatchObject({ type: 'rule', rules: ['=equals'] });
    });

    it('treats a lone plus as a selector', () => {
        expect(only(parseStylesheet('+'))).toMatchObject({ type: 'rule', rules: ['+'] });
    });
});

describe('parseStylesheet: comments', () => {
    it('keeps silent comment bodies as text', () => {
        const root = parseStylesheet('// silent\n  nested body\n    :not parsed\na');
        expect(root.children).toHaveLength(2);
        expect(root.children[0]).toEqual({
            type: 'comment',
            value: '// silent',
            silent: true,
            lines: ['nested body', ':not parsed'],
            line: 1,
            children: [],
        });
        expect(root.children[1]).toMatchObject({ type: 'rule', rules: ['a'] });
    });

    it('marks loud comments', () => {
        expect(only(parseStylesheet('/* loud'))).toMatchObject({ type: 'comment', silent: false, lines: [] });
    });

    it('treats other slashes as selectors', () => {
        expect(only(parseStylesheet('/deep/ a'))).toMatchObject({ type: 'rule', rules: ['/deep/ a'] });
    });
});

describe('parseStylesheet: variables', () => {
    it('parses a binding', () => {
        expect(only(parseStylesheet('!width = 10px'))).toEqual({
            type: 'variable',
            name: 'width',
            expression: { type: 'raw', text: '10px', line: 1, offset: 9 },
            guarded: false,
            line: 1,
            children: [],
        });
    });

    it('parses a guarded binding', () => {
        expect(only(parseStylesheet('!w ||= 5'))).toMatchObject({ type: 'variable', name: 'w', guarded: true });
    });

    it('rejects an invalid binding', () => {
        expect(catchSyntaxError(() => parseStylesheet('!9 = 1')).message).toBe('Invalid variable: "!9 = 1".');
    });

    it('rejects anything nested beneath a binding', () => {
        for (const child of ['a', ':color red', '!!!', '@if']) {
            const err = catchSyntaxError(() => parseStylesheet(`!w = 1\n  ${child}`));
            expect(err.message).toBe('Illegal nesting: Nothing may be nested beneath variable declarations.');
            expect(err.line).toBe(2);
        }
    });

    it('rejects a malformed expression', () => {
        const err = catchSyntaxError(() => parseStylesheet('a\n  b\n!x = (1'));
        expect(err.message).toBe('Unclosed "(" in expression "(1".');
        expect(err.line).toBe(3);
    });
});

describe('parseStylesheet: rule continuation', () => {
    it('merges a comma-terminated rule with the next rule', () => {
        const rule = only(parseStylesheet('a,\nb\n  :color red'));
        expect(rule).toMatchObject({ type: 'rule', rules: ['a,', 'b'], line: 1 });
        expect(rule.children).toEqual([{ type: 'attribute', name: 'color', value: 'red', syntax: 'prefixed', line: 3, children: [] }]);
    });

    it('merges several continued rules', () => {
        const root = parseStylesheet('a,\nb,\nc\n  x: y\nd');
        expect(root.children).toHaveLength(2);
        expect(root.children[0]).toMatchObject({ type: 'rule', rules: ['a,', 'b,', 'c'] });
        expect(root.children[0].children).toHaveLength(1);
        expect(root.children[1]).toMatchObject({ type: 'rule', rules: ['d'] });
    });

    it('merges continued rules inside a rule', () => {
        const rule = only(parseStylesheet('nav\n  a,\n  span\n    :color red'));
        expect(rule.children).toHaveLength(1);
        expect(rule.children[0]).toMatchObject({ type: 'rule', rules: ['a,', 'span'] });
    });

    it('rejects children under a continued rule', () => {
        const err = catchSyntaxError(() => parseStylesheet('a,\n  :color red\nb'));
        expect(err.message).toBe("Rules can't end in commas.");
        expect(err.line).toBe(1);
    });

    it('rejects a non-rule after a continued rule', () => {
        const err = catchSyntaxError(() => parseStylesheet('a,\nb,\n!x = 1'));
        expect(err.message).toBe("Rules can't end in commas.");
        expect(err.line).toBe(1);
    });

    it('rejects a continued rule at the end of its level', () => {
        expect(catchSyntaxError(() => parseStylesheet('a,')).line).toBe(1);
        const err = catchSyntaxError(() => parseStylesheet('nav\n  a,\nb'));
        expect(err.message).toBe("Rules can't end in commas.");
        expect(err.line).toBe(2);
    });
});

describe('parseStylesheet: placement', () => {
    it('only allows mixin definitions at the root', () => {
        const err = catchSyntaxError(() => parseStylesheet('a\n  =foo'));
        expect(err.message).toBe('Mixins may only be defined at the root of a document.');
        expect(err.line).toBe(2);
    });

    it('allows generic directives anywhere', () => {
        const rule = only(parseStylesheet('a\n  @media print\n    :display none'));
        expect(rule.children[0]).toMatchObject({ type: 'directive', value: '@media print' });
        expect(rule.children[0].children[0]).toMatchObject({ type: 'attribute', name: 'display' });
    });
});

describe('parseStylesheet: options and errors', () => {
    it('annotates the root with resolved options', () => {
        const root = parseStylesheet('a', { style: 'compact', filename: 'main.terrace' });
        expect(root.options).toEqual({
            style: 'compact',
            loadPaths: ['.'],
            precompiledLocation: './.terrace-cache',
            filename: 'main.terrace',
            line: undefined,
        });
        expect(root.children[0].filename).toBe('main.terrace');
    });

    it('stamps the filename on escaping errors', () => {
        const err = catchSyntaxError(() => parseStylesheet('  a', { filename: 'main.terrace' }));
        expect(err.filename).toBe('main.terrace');
        expect(err.line).toBe(1);
        expect(err.location).toBe(' (main.terrace:1)');
    });

    it('reports lines relative to the starting line', () => {
        const err = catchSyntaxError(() => parseStylesheet('a\n  b\n      c', { line: 10 }));
        expect(err.line).toBe(12);
        expect(err.location).toBe(' (line 12)');
    });

    it('parses a document saved with a byte order mark', () => {
        const root = parseStylesheet('\uFEFFa\n  :color red');
        expect(only(root)).toMatchObject({ type: 'rule', rules: ['a'], children: [{ type: 'attribute', name: 'color', value: 'red' }] });
    });

    it('returns an empty root for an empty document', () => {
        expect(parseStylesheet('\n  \n').children).toEqual([]);
    });
});

describe('classifyLine', () => {
    const env: ParseEnv<RawExpression> = {
        options: resolveOptions(),
        collaborators: DEFAULT_COLLABORATORS,
        appendChildren: () => {},
    };
    const line = (text: string) => ({ text, depth: 0, index: 1, offset: 0, children: [] });
    const root: RootNode = { type: 'root', children: [], options: resolveOptions() };

    it('dispatches on the leading character', () => {
        expect(Object.keys(LINE_HANDLERS).sort()).toEqual(['!', '+', '/', ':', '=', '@', '\\'].sort());
    });

    it('classifies a single line without touching the parent', () => {
        const result = classifyLine({ env, line: line('a > b'), parent: root, root: true });
        expect(result).toEqual({ kind: 'node', node: { type: 'rule', rules: ['a > b'], line: 1, children: [] } });
        expect(root.children).toHaveLength(0);
    });

    it('runs a single handler in isolation', () => {
        const result = LINE_HANDLERS[':']({ env, line: line('::after'), parent: root, root: true });
        expect(result).toMatchObject({ kind: 'node', node: { type: 'rule', rules: ['::after'] } });
    });
});
