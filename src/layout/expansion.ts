import { DisplayItem, FlatNode } from '../models/types';
import { DEFAULT_LAYOUT_CONFIG, LayoutConfig } from './config';
import { buildDisplayItems } from './gaps';
import { computeCompactHeights, computeHeightsToFit, topLevelBudget } from './heights';
import { BlockRecord, LayoutTree, LevelRecord, blockView, levelView } from './layoutTree';
import { BoundaryMarker } from './markers';
import { NodeIndex } from './nodeIndex';
import { Scheduler, afterTicks } from './scheduler';
import { BlockView, RenderSurface } from './surface';

/**
 * Collapsed/expanded state of every block, the nested levels behind the
 * expanded ones, and the relayout that keeps each expanded block tall enough
 * for what it contains.
 *
 * Mutations take effect on the surface at once; relayout and markers run
 * `settleTicks` deferred ticks later, once the surface has caught up.
 * The controller is settled when none of its deferred callbacks is pending.
 */
export class ExpansionController {
    private readonly tree = new LayoutTree();
    private readonly config: LayoutConfig;
    private settledWaiters: (() => void)[] = [];
    private outstanding = 0;

    constructor(
        private readonly index: NodeIndex,
        private readonly surface: RenderSurface,
        private readonly scheduler: Scheduler,
        config: LayoutConfig = DEFAULT_LAYOUT_CONFIG,
    ) {
        this.config = { ...config };
    }

    itemsFor(node: FlatNode): DisplayItem[] {
        return buildDisplayItems(node, this.index.childrenOf(node.id));
    }

    renderTop(viewport: number = this.config.defaultViewport): void {
        const previous = this.tree.top;
        if (previous) {
            for (const ownerKey of this.tree.discardLevel(previous)) {
                this.surface.unmountLevel(ownerKey);
            }
        }
        this.tree.reset();

        const cfg = this.config;
        const root = this.index.root;
        const items = this.itemsFor(root);
        const budget = topLevelBudget(items, cfg.outerMinExtent, cfg.outerGapExtent, viewport, cfg.minViewport);
        const { heights } = computeHeightsToFit(
            items, cfg.outerMinExtent, cfg.outerMaxExtent, budget, cfg.outerGapExtent, cfg.redistributionLimit
        );

        const level = this.tree.createLevel(root, null, 0, items, heights, it => this.isDrillable(it));
        this.surface.mountLevel(levelView(level));
        this.scheduleSettle();
    }

    /**
     * Flip one block between collapsed and expanded. Returns false, doing
     * nothing, for gaps, leaves and unknown keys.
     */
    toggle(key: string): boolean {
        const block = this.tree.block(key);
        if (!block || !block.drillable) { return false; }

        if (block.expanded) {
            this.collapseBlock(block);
        } else {
            this.expandBlock(block);
        }
        this.scheduleSettle();
        return true;
    }

    expandAll(): void {
        const top = this.tree.top;
        if (!top) { return; }
        for (const block of top.blocks) {
            if (block.drillable) {
                this.expandRecursively(block);
            }
        }
        this.scheduleSettle();
    }

    collapseAll(): void {
        const top = this.tree.top;
        if (!top) { return; }
        for (const block of top.blocks) {
            if (block.expanded || block.nested) {
                this.collapseBlock(block);
            }
        }
        this.scheduleSettle();
    }

    /**
     * Grow or shrink expanded blocks, deepest first, until no extent moves.
     * Returns the number of passes run.
     */
    relayout(): number {
        const maxPasses = this.config.relayoutMaxPasses;
        for (let pass = 1; pass <= maxPasses; pass++) {
            let changed = false;
            for (const block of this.tree.expandedBlocks()) {
                const need = Math.round(this.tree.requiredHeight(block, this.config));
                const current = Math.round(block.height);
                if (Math.abs(current - need) >= 1) {
                    block.height = need;
                    this.surface.updateBlock(blockView(block));
                    changed = true;
                }
            }
            if (!changed) { return pass; }
        }
        return maxPasses;
    }

    refreshMarkers(): void {
        const top = this.tree.top;
        if (!top) { return; }
        this.surface.renderMarkers(null, this.tree.markersFor(top));
        for (const block of this.tree.expandedBlocks()) {
            if (block.nested) {
                this.surface.renderMarkers(block.key, this.tree.markersFor(block.nested));
            }
        }
    }

    settle(): void {
        this.relayout();
        this.refreshMarkers();
    }

    get isSettled(): boolean {
        return this.outstanding === 0;
    }

    /**
     * Resolves once every deferred relayout, marker pass and nested expansion
     * has run, or at once when nothing is pending.
     */
    whenSettled(): Promise<void> {
        if (this.outstanding === 0) {
            return Promise.resolve();
        }
        return new Promise(resolve => {
            this.settledWaiters.push(resolve);
        });
    }

    block(key: string): BlockView | undefined {
        const block = this.tree.block(key);
        return block ? blockView(block) : undefined;
    }

    baseHeight(key: string): number | undefined {
        return this.tree.bases.get(key);
    }

    get topBlocks(): BlockView[] {
        return this.tree.top ? this.tree.top.blocks.map(blockView) : [];
    }

    nestedBlocks(ownerKey: string): BlockView[] {
        const nested = this.tree.block(ownerKey)?.nested;
        return nested ? nested.blocks.map(blockView) : [];
    }

    expandedKeys(): string[] {
        return this.tree.expandedBlocks().map(b => b.key);
    }

    get blockCount(): number {
        return this.tree.blockCount;
    }

    markersFor(ownerKey: string | null): BoundaryMarker[] {
        if (ownerKey === null) {
            return this.tree.top ? this.tree.markersFor(this.tree.top) : [];
        }
        const nested = this.tree.block(ownerKey)?.nested;
        return nested ? this.tree.markersFor(nested) : [];
    }

    private isDrillable(item: DisplayItem): boolean {
        return item.kind === 'child' && this.index.hasChildren(item.node.id);
    }

    private expandBlock(block: BlockRecord): LevelRecord | undefined {
        if (block.item.kind !== 'child') { return undefined; }
        if (block.nested) {
            this.discardNested(block);
        }

        const cfg = this.config;
        const items = this.itemsFor(block.item.node);
        const { heights } = computeCompactHeights(items, cfg.innerMinExtent, cfg.innerGapExtent);
        const level = this.tree.createLevel(
            block.item.node, block.key, block.depth + 1, items, heights, it => this.isDrillable(it)
        );

        block.expanded = true;
        block.nested = level;
        this.surface.updateBlock(blockView(block));
        this.surface.mountLevel(levelView(level));

        this.defer(cfg.markerTicks, () => {
            if (this.isLive(block, level)) {
                this.surface.renderMarkers(block.key, this.tree.markersFor(level));
            }
        });
        return level;
    }

    private expandRecursively(block: BlockRecord): void {
        const level = this.expandBlock(block);
        if (!level) { return; }

        this.defer(this.config.settleTicks, () => {
            if (!this.isLive(block, level)) { return; }
            for (const child of level.blocks) {
                if (child.drillable) {
                    this.expandRecursively(child);
                }
            }
            this.scheduleSettle();
        });
    }

    private collapseBlock(block: BlockRecord): void {
        this.discardNested(block);
        block.expanded = false;
        block.height = this.tree.baseHeight(block);
        this.surface.updateBlock(blockView(block));
    }

    private discardNested(block: BlockRecord): void {
        if (!block.nested) { return; }
        for (const ownerKey of this.tree.discardLevel(block.nested)) {
            this.surface.unmountLevel(ownerKey);
        }
        block.nested = undefined;
    }

    // Deferred work is dropped once its block or level has been discarded.
    private isLive(block: BlockRecord, level: LevelRecord): boolean {
        return this.tree.block(block.key) === block && block.nested === level;
    }

    private scheduleSettle(): void {
        this.defer(this.config.settleTicks, () => this.settle());
    }

    private defer(ticks: number, callback: () => void): void {
        this.outstanding++;
        afterTicks(this.scheduler, ticks, () => {
            try {
                callback();
            } finally {
                this.outstanding--;
                if (this.outstanding === 0) {
                    this.releaseWaiters();
                }
            }
        });
    }

    private releaseWaiters(): void {
        const waiters = this.settledWaiters;
        this.settledWaiters = [];
        for (const resolve of waiters) {
            resolve();
        }
    }
}
