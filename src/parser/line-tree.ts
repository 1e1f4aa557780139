import { TerraceSyntaxError } from './errors';
import type { LogicalLine } from './types';

export interface LineTreeResult {
    nodes: LogicalLine[];
    /** Index of the first line not consumed by this level */
    next: number;
}

/**
 * Nest a flat line sequence by depth, starting at `start`.
 *
 * The first line fixes the depth of this level. Lines one level deeper become
 * children of the preceding sibling; shallower lines end the level and are
 * left for an ancestor call.
 */
export function buildLineTree(lines: LogicalLine[], start = 0): LineTreeResult {
    const nodes: LogicalLine[] = [];
    if (start >= lines.length) return { nodes, next: start };

    const base = lines[start].depth;
    let i = start;
    while (i < lines.length && lines[i].depth >= base) {
        const line = lines[i];
        const previous = nodes[nodes.length - 1];
        if (line.depth === base || !previous) {
            nodes.push(line);
            i++;
            continue;
        }

        if (line.depth > base + 1) {
            throw new TerraceSyntaxError(`The line was indented ${line.depth - base} levels deeper than the previous line.`, line.index);
        }

        const nested = buildLineTree(lines, i);
        previous.children = nested.nodes;
        i = nested.next;
    }

    return { nodes, next: i };
}
