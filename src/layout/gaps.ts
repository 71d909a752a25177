import { DisplayItem, FlatNode, GAP_NAME, GapItem, childItem } from '../models/types';

type Range = Pick<FlatNode, 'id' | 'start' | 'end'>;

function gapItem(parent: Range, start: number, end: number): GapItem {
    return {
        kind: 'gap',
        id: `${parent.id}/gap@${start}`,
        name: GAP_NAME,
        start,
        end,
        size: end - start,
    };
}

/**
 * Merge a parent's children with the unmapped ranges between them, in start
 * order. Children and gaps together tile [parent.start, parent.end).
 */
export function buildDisplayItems(parent: Range, children: readonly FlatNode[]): DisplayItem[] {
    const items: DisplayItem[] = [];
    let cursor = parent.start;

    for (const child of children) {
        if (child.start > cursor) {
            items.push(gapItem(parent, cursor, child.start));
        }
        items.push(childItem(child));
        cursor = Math.max(cursor, child.end);
    }
    if (cursor < parent.end) {
        items.push(gapItem(parent, cursor, parent.end));
    }

    return items;
}

export function synthesizeGaps(parent: Range, children: readonly FlatNode[]): GapItem[] {
    return buildDisplayItems(parent, children).filter((item): item is GapItem => item.kind === 'gap');
}
