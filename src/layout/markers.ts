import { DisplayItem } from '../models/types';
import { formatAddress } from '../util/format';

/** An item already placed in its stack: `top` is relative to the stack. */
export interface PositionedItem {
    readonly item: DisplayItem;
    readonly top: number;
    readonly height: number;
    /** Background hint of the block, e.g. "depth-1" or "gap". */
    readonly hint: string;
}

export interface BoundaryMarker {
    readonly y: number;
    readonly address: number;
    readonly label: string;
    readonly hint: string;
}

// A gap borrows its background from the nearest real block, looking down first.
function hintAt(stack: readonly PositionedItem[], index: number, fallback: string): string {
    const own = stack[index];
    if (own.item.kind !== 'gap') { return own.hint; }

    for (let j = index + 1; j < stack.length; j++) {
        if (stack[j].item.kind !== 'gap') { return stack[j].hint; }
    }
    for (let j = index - 1; j >= 0; j--) {
        if (stack[j].item.kind !== 'gap') { return stack[j].hint; }
    }
    return fallback;
}

export function computeBoundaryMarkers(stack: readonly PositionedItem[], fallbackHint: string): BoundaryMarker[] {
    if (stack.length === 0) { return []; }

    const boundaries = stack.map((entry, i) => ({
        y: entry.top,
        address: entry.item.start,
        hint: hintAt(stack, i, fallbackHint),
    }));
    const last = stack[stack.length - 1];
    boundaries.push({
        y: last.top + last.height,
        address: last.item.end,
        hint: hintAt(stack, stack.length - 1, fallbackHint),
    });

    const byY = new Map<number, BoundaryMarker>();
    for (const b of boundaries) {
        const key = Math.round(b.y);
        if (!byY.has(key)) {
            byY.set(key, { y: key, address: b.address, label: formatAddress(b.address), hint: b.hint });
        }
    }

    return Array.from(byY.values()).sort((a, b) => a.y - b.y);
}
