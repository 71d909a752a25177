export interface RangeNode {
    readonly name: string;
    readonly start: number;
    readonly size: number;
    readonly children: readonly RangeNode[];
}

export interface FlatNode {
    readonly id: string;
    readonly name: string;
    readonly start: number;
    readonly size: number;
    readonly end: number;
    readonly depth: number;      // root = 0
    readonly parent: string | null;
}

export interface RootSummary {
    readonly id: string;
    readonly name: string;
    readonly start: number;
    readonly size: number;
    readonly end: number;
}

export interface MemoryMapDocument {
    readonly root: RootSummary;
    readonly nodes: readonly FlatNode[];
}

interface DisplayItemBase {
    readonly id: string;
    readonly name: string;
    readonly start: number;
    readonly end: number;
    readonly size: number;
}

export interface ChildItem extends DisplayItemBase {
    readonly kind: 'child';
    readonly node: FlatNode;
}

export interface GapItem extends DisplayItemBase {
    readonly kind: 'gap';
}

export type DisplayItem = ChildItem | GapItem;

export const GAP_NAME = 'Unmapped / Reserved';

export function rangeEnd(node: RangeNode): number {
    return node.start + node.size;
}

/**
 * Build a node with its children sorted by start address.
 * The sort is stable, so children sharing a start keep their input order.
 */
export function createRangeNode(
    name: string,
    start: number,
    size: number,
    children: readonly RangeNode[] = [],
): RangeNode {
    const sorted = children.slice().sort((a, b) => a.start - b.start);
    return { name, start, size, children: sorted };
}

export function childItem(node: FlatNode): ChildItem {
    return {
        kind: 'child',
        id: node.id,
        name: node.name,
        start: node.start,
        end: node.end,
        size: node.size,
        node,
    };
}

export function isGap(item: DisplayItem): item is GapItem {
    return item.kind === 'gap';
}
