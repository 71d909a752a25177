import { DisplayItem, FlatNode } from '../models/types';
import { LayoutConfig } from './config';
import { BoundaryMarker, PositionedItem, computeBoundaryMarkers } from './markers';
import { BlockView, LevelView } from './surface';

export interface BlockRecord {
    readonly key: string;
    readonly item: DisplayItem;
    readonly depth: number;
    readonly drillable: boolean;
    expanded: boolean;
    height: number;
    nested: LevelRecord | undefined;
}

export interface LevelRecord {
    readonly ownerKey: string | null;
    readonly node: FlatNode;
    readonly depth: number;
    readonly blocks: readonly BlockRecord[];
}

export const TOP_LEVEL_HINT = 'stack';
const MAX_HINT_DEPTH = 4;

/**
 * Extent each block got on its first layout, keyed by block key. Written
 * once; dropped only when the level holding the block is discarded.
 */
export class BaseHeightCache {
    private readonly heights = new Map<string, number>();

    remember(key: string, height: number): void {
        if (!this.heights.has(key)) {
            this.heights.set(key, height);
        }
    }

    get(key: string): number | undefined {
        return this.heights.get(key);
    }

    forget(key: string): void {
        this.heights.delete(key);
    }

    clear(): void {
        this.heights.clear();
    }

    get size(): number {
        return this.heights.size;
    }
}

export function blockHint(block: Pick<BlockRecord, 'item' | 'depth'>): string {
    if (block.item.kind === 'gap') { return 'gap'; }
    return `depth-${Math.min(MAX_HINT_DEPTH, Math.max(0, block.depth))}`;
}

export function blockView(block: BlockRecord): BlockView {
    return {
        key: block.key,
        item: block.item,
        depth: block.depth,
        drillable: block.drillable,
        expanded: block.expanded,
        height: block.height,
        hint: blockHint(block),
    };
}

export function levelView(level: LevelRecord): LevelView {
    return {
        ownerKey: level.ownerKey,
        node: level.node,
        depth: level.depth,
        blocks: level.blocks.map(blockView),
    };
}

/** Height of a level's stack: bottom edge of its last block. */
export function contentHeight(level: LevelRecord): number {
    return level.blocks.reduce((total, block) => total + block.height, 0);
}

export function positionLevel(level: LevelRecord): PositionedItem[] {
    let top = 0;
    return level.blocks.map(block => {
        const placed = { item: block.item, top, height: block.height, hint: blockHint(block) };
        top += block.height;
        return placed;
    });
}

/**
 * Arena of every block currently laid out, indexed by block key, with the
 * level structure hanging off the top level.
 */
export class LayoutTree {
    private readonly blocks = new Map<string, BlockRecord>();
    readonly bases = new BaseHeightCache();
    private topLevel: LevelRecord | undefined;

    get top(): LevelRecord | undefined {
        return this.topLevel;
    }

    block(key: string): BlockRecord | undefined {
        return this.blocks.get(key);
    }

    get blockCount(): number {
        return this.blocks.size;
    }

    reset(): void {
        this.blocks.clear();
        this.bases.clear();
        this.topLevel = undefined;
    }

    createLevel(
        node: FlatNode,
        ownerKey: string | null,
        depth: number,
        items: readonly DisplayItem[],
        heights: readonly number[],
        isDrillable: (item: DisplayItem) => boolean,
    ): LevelRecord {
        const blocks = items.map((item, i): BlockRecord => {
            const block: BlockRecord = {
                key: item.id,
                item,
                depth,
                drillable: item.kind !== 'gap' && isDrillable(item),
                expanded: false,
                height: heights[i],
                nested: undefined,
            };
            this.blocks.set(block.key, block);
            if (item.kind !== 'gap') {
                this.bases.remember(block.key, block.height);
            }
            return block;
        });

        const level: LevelRecord = { ownerKey, node, depth, blocks };
        if (ownerKey === null) {
            this.topLevel = level;
        }
        return level;
    }

    /**
     * Remove a level and everything nested below it. Returns the owner keys
     * of the removed levels, deepest first.
     */
    discardLevel(level: LevelRecord): string[] {
        const removed: string[] = [];
        for (const block of level.blocks) {
            if (block.nested) {
                removed.push(...this.discardLevel(block.nested));
                block.nested = undefined;
            }
            this.blocks.delete(block.key);
            this.bases.forget(block.key);
        }
        if (level.ownerKey !== null) {
            removed.push(level.ownerKey);
        }
        return removed;
    }

    /** Expanded blocks, deepest first. */
    expandedBlocks(): BlockRecord[] {
        const expanded = Array.from(this.blocks.values()).filter(b => b.expanded && b.nested !== undefined);
        return expanded.sort((a, b) => b.depth - a.depth);
    }

    baseHeight(block: BlockRecord): number {
        return this.bases.get(block.key) ?? block.height;
    }

    requiredHeight(block: BlockRecord, config: LayoutConfig): number {
        const base = this.baseHeight(block);
        if (!block.expanded || !block.nested) { return base; }
        const needed = contentHeight(block.nested) + config.innerPaddingTop + config.innerPaddingBottom;
        return Math.max(base, needed);
    }

    markersFor(level: LevelRecord): BoundaryMarker[] {
        const owner = level.ownerKey === null ? undefined : this.blocks.get(level.ownerKey);
        const fallback = owner ? blockHint(owner) : TOP_LEVEL_HINT;
        return computeBoundaryMarkers(positionLevel(level), fallback);
    }
}
