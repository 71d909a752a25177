import { FlatNode, RangeNode, rangeEnd } from '../models/types';

export function nodeId(name: string, start: number, parentId: string | null): string {
    const token = `${name}@0x${start.toString(16)}`;
    return parentId ? `${parentId}/${token}` : token;
}

/**
 * Depth-first pre-order: a parent always precedes its children, siblings
 * follow in start order.
 */
export function flattenTree(root: RangeNode): FlatNode[] {
    const out: FlatNode[] = [];

    const visit = (node: RangeNode, depth: number, parent: string | null): void => {
        const id = nodeId(node.name, node.start, parent);
        out.push({
            id,
            name: node.name,
            start: node.start,
            size: node.size,
            end: rangeEnd(node),
            depth,
            parent,
        });
        const kids = node.children.slice().sort((a, b) => a.start - b.start);
        for (const child of kids) {
            visit(child, depth + 1, id);
        }
    };

    visit(root, 0, null);
    return out;
}
