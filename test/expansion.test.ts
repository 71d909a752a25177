import * as assert from 'assert';
import { createRangeNode } from '../src/models/types';
import { resolveLayoutConfig } from '../src/layout/config';
import { ExpansionController } from '../src/layout/expansion';
import { flattenTree } from '../src/layout/flatten';
import { NodeIndex } from '../src/layout/nodeIndex';
import { ImmediateScheduler, ManualScheduler } from '../src/layout/scheduler';
import { OutlineSurface } from '../src/providers/outlineSurface';
import { SOC, indexFixture } from './helpers';

// R > L1 > L2 > L3 > L4, each level covering the first half of its parent.
function chainIndex(): NodeIndex {
    const l4 = createRangeNode('L4', 0, 0x100);
    const l3 = createRangeNode('L3', 0, 0x200, [l4]);
    const l2 = createRangeNode('L2', 0, 0x400, [l3]);
    const l1 = createRangeNode('L1', 0, 0x800, [l2]);
    return new NodeIndex(flattenTree(createRangeNode('R', 0, 0x1000, [l1])));
}

function height(controller: ExpansionController, key: string): number | undefined {
    return controller.block(key)?.height;
}

describe('ExpansionController', () => {
    let surface: OutlineSurface;
    let scheduler: ManualScheduler;
    let controller: ExpansionController;

    beforeEach(() => {
        surface = new OutlineSurface();
        scheduler = new ManualScheduler();
        controller = new ExpansionController(indexFixture('soc.json'), surface, scheduler);
        controller.renderTop(900);
        scheduler.flush();
    });

    // ── Top level ──
    it('should lay the top level out with fit-to-budget extents', () => {
        assert.deepStrictEqual(
            controller.topBlocks.map(b => [b.key, b.height, b.drillable]),
            [
                [SOC.a, 140, true],
                [SOC.gapAfterA, 52, false],
                [SOC.b, 140, false],
                [SOC.gapAfterB, 52, false],
            ]
        );
        assert.strictEqual(controller.baseHeight(SOC.a), 140);
    });

    it('should mark the top-level boundaries once settled', () => {
        assert.deepStrictEqual(
            surface.markersOf(null).map(m => [m.y, m.label, m.hint]),
            [
                [0, '0x0000_0000', 'depth-0'],
                [140, '0x0004_0000', 'depth-0'],
                [192, '0x0008_0000', 'depth-0'],
                [332, '0x000C_0000', 'depth-0'],
                [384, '0x1000_0000', 'depth-0'],
            ]
        );
    });

    // ── Toggling ──
    it('should materialize a compact nested level on expand', () => {
        assert.strictEqual(controller.toggle(SOC.a), true);
        assert.deepStrictEqual(
            controller.nestedBlocks(SOC.a).map(b => [b.item.name, b.height, b.depth]),
            [['A1', 44, 1], ['Unmapped / Reserved', 44, 1], ['A2', 44, 1], ['Unmapped / Reserved', 44, 1]]
        );
        assert.strictEqual(surface.isMounted(SOC.a), true);
        assert.strictEqual(surface.block(SOC.a)?.expanded, true);
    });

    it('should defer relayout until the surface has caught up', () => {
        controller.toggle(SOC.a);
        scheduler.tick();
        scheduler.tick();
        assert.strictEqual(height(controller, SOC.a), 140);
        scheduler.tick();
        assert.strictEqual(height(controller, SOC.a), 196);
    });

    it('should grow an expanded block to fit its nested level plus padding', () => {
        controller.toggle(SOC.a);
        scheduler.flush();
        assert.strictEqual(height(controller, SOC.a), 196);
        assert.strictEqual(surface.block(SOC.a)?.height, 196);
    });

    it('should propagate nested growth to ancestors', () => {
        controller.toggle(SOC.a);
        scheduler.flush();
        controller.toggle(SOC.a1);
        scheduler.flush();
        assert.strictEqual(height(controller, SOC.a1), 108);
        assert.strictEqual(height(controller, SOC.a), 260);
        assert.deepStrictEqual(controller.expandedKeys(), [SOC.a1, SOC.a]);
    });

    it('should restore the base extent and drop nested state on collapse', () => {
        controller.toggle(SOC.a);
        scheduler.flush();
        controller.toggle(SOC.a1);
        scheduler.flush();

        controller.toggle(SOC.a);
        scheduler.flush();

        assert.strictEqual(height(controller, SOC.a), 140);
        assert.strictEqual(controller.baseHeight(SOC.a), 140);
        assert.deepStrictEqual(controller.expandedKeys(), []);
        assert.strictEqual(controller.block(SOC.a1), undefined);
        assert.strictEqual(controller.baseHeight(SOC.a1), undefined);
        assert.strictEqual(controller.blockCount, 4);
        assert.strictEqual(surface.isMounted(SOC.a), false);
        assert.strictEqual(surface.isMounted(SOC.a1), false);
    });

    it('should shrink back when a nested block collapses', () => {
        controller.toggle(SOC.a);
        controller.toggle(SOC.a1);
        scheduler.flush();
        controller.toggle(SOC.a1);
        scheduler.flush();
        assert.strictEqual(height(controller, SOC.a1), 44);
        assert.strictEqual(height(controller, SOC.a), 196);
    });

    it('should ignore gaps, leaves and unknown blocks', () => {
        assert.strictEqual(controller.toggle(SOC.gapAfterA), false);
        assert.strictEqual(controller.toggle(SOC.b), false);
        assert.strictEqual(controller.toggle('nope'), false);
        assert.strictEqual(scheduler.pending, 0);
        assert.deepStrictEqual(controller.expandedKeys(), []);
    });

    // ── Markers ──
    it('should move top-level markers with the block edges', () => {
        controller.toggle(SOC.a);
        scheduler.flush();
        assert.deepStrictEqual(
            controller.markersFor(null).map(m => [m.y, m.label]),
            [[0, '0x0000_0000'], [196, '0x0004_0000'], [248, '0x0008_0000'], [388, '0x000C_0000'], [440, '0x1000_0000']]
        );
    });

    it('should mark the boundaries of each expanded level', () => {
        controller.toggle(SOC.a);
        scheduler.flush();
        assert.deepStrictEqual(
            surface.markersOf(SOC.a).map(m => [m.y, m.label, m.hint]),
            [
                [0, '0x0000_0000', 'depth-1'],
                [44, '0x0001_0000', 'depth-1'],
                [88, '0x0002_0000', 'depth-1'],
                [132, '0x0003_0000', 'depth-1'],
                [176, '0x0004_0000', 'depth-1'],
            ]
        );
    });

    // ── Global commands ──
    it('should expand every drillable block at every depth', () => {
        controller.expandAll();
        scheduler.flush();
        assert.deepStrictEqual(controller.expandedKeys(), [SOC.a1, SOC.a]);
        assert.strictEqual(height(controller, SOC.a), 260);
        assert.strictEqual(height(controller, SOC.a1), 108);
        assert.strictEqual(surface.isMounted(SOC.a1), true);
    });

    it('should collapse everything and discard nested state', () => {
        controller.expandAll();
        scheduler.flush();
        controller.collapseAll();
        scheduler.flush();
        assert.deepStrictEqual(controller.expandedKeys(), []);
        assert.deepStrictEqual(controller.topBlocks.map(b => b.height), [140, 52, 140, 52]);
        assert.strictEqual(controller.blockCount, 4);
        assert.strictEqual(surface.isMounted(SOC.a), false);
        assert.strictEqual(surface.isMounted(SOC.a1), false);
    });

    it('should drop deferred expansion of blocks collapsed in the meantime', () => {
        controller.expandAll();
        controller.collapseAll();
        scheduler.flush();
        assert.deepStrictEqual(controller.expandedKeys(), []);
        assert.strictEqual(controller.blockCount, 4);
    });

    it('should re-expand after collapse-all with the same extents', () => {
        controller.expandAll();
        scheduler.flush();
        controller.collapseAll();
        scheduler.flush();
        controller.expandAll();
        scheduler.flush();
        assert.strictEqual(height(controller, SOC.a), 260);
        assert.strictEqual(controller.baseHeight(SOC.a1), 44);
    });

    // ── Relayout ──
    it('should reach a fixed point in two passes', () => {
        controller.toggle(SOC.a);
        controller.toggle(SOC.a1);
        assert.strictEqual(controller.relayout(), 2);
        assert.strictEqual(controller.relayout(), 1);
    });

    it('should stop at the pass ceiling', () => {
        const capped = new ExpansionController(
            indexFixture('soc.json'), new OutlineSurface(), new ManualScheduler(),
            resolveLayoutConfig({ relayoutMaxPasses: 1 })
        );
        capped.renderTop();
        capped.toggle(SOC.a);
        assert.strictEqual(capped.relayout(), 1);
        assert.strictEqual(height(capped, SOC.a), 196);
    });

    // ── Settling ──
    it('should stay unsettled until every deferred pass has run', async () => {
        let resolved = false;
        controller.toggle(SOC.a);
        const settled = controller.whenSettled().then(() => { resolved = true; });
        assert.strictEqual(controller.isSettled, false);

        scheduler.tick();
        scheduler.tick();
        await Promise.resolve();
        assert.strictEqual(resolved, false);

        scheduler.flush();
        await settled;
        assert.strictEqual(resolved, true);
        assert.strictEqual(controller.isSettled, true);
    });

    it('should resolve at once when nothing is pending', async () => {
        assert.strictEqual(controller.isSettled, true);
        await controller.whenSettled();
        assert.strictEqual(controller.toggle(SOC.gapAfterA), false);
        await controller.whenSettled();
    });

    it('should wait out nested expansion before resolving', async () => {
        const chain = new ManualScheduler();
        const deep = new ExpansionController(chainIndex(), new OutlineSurface(), chain);
        deep.renderTop(900);
        chain.flush();

        let resolved = false;
        deep.expandAll();
        const settled = deep.whenSettled().then(() => { resolved = true; });
        for (let i = 0; i < 3; i++) {
            chain.tick();
        }
        await Promise.resolve();
        assert.strictEqual(resolved, false);
        assert.ok(chain.pending > 0);

        chain.flush();
        await settled;
        assert.strictEqual(deep.expandedKeys().length, 3);
    });

    it('should settle on its own with an immediate scheduler', async () => {
        const live = new OutlineSurface();
        const immediate = new ExpansionController(indexFixture('soc.json'), live, new ImmediateScheduler());
        immediate.renderTop(900);
        await immediate.whenSettled();
        assert.strictEqual(live.markersOf(null).length, 5);

        immediate.toggle(SOC.a);
        await immediate.whenSettled();
        assert.strictEqual(live.block(SOC.a)?.height, 196);
    });

    it('should expand a deep chain fully before resolving', async () => {
        const deep = new ExpansionController(chainIndex(), new OutlineSurface(), new ImmediateScheduler());
        deep.renderTop(900);
        await deep.whenSettled();

        deep.expandAll();
        await deep.whenSettled();
        assert.deepStrictEqual(deep.expandedKeys(), [
            'R@0x0/L1@0x0/L2@0x0/L3@0x0',
            'R@0x0/L1@0x0/L2@0x0',
            'R@0x0/L1@0x0',
        ]);
    });

    it('should resolve an idle controller without scheduling anything', async () => {
        const idle = new ExpansionController(chainIndex(), new OutlineSurface(), new ImmediateScheduler());
        await idle.whenSettled();
        assert.strictEqual(idle.blockCount, 0);
    });
});

describe('OutlineSurface', () => {
    it('should print the collapsed layout with its markers', () => {
        const surface = new OutlineSurface();
        const scheduler = new ManualScheduler();
        const controller = new ExpansionController(indexFixture('soc.json'), surface, scheduler);
        controller.renderTop(900);
        scheduler.flush();

        assert.deepStrictEqual(surface.toLines(), [
            '0x0000_0000',
            '  A (256.00 KB) h=140 [+]',
            '0x0004_0000',
            '  Unmapped / Reserved (256.00 KB) h=52',
            '0x0008_0000',
            '  B (256.00 KB) h=140',
            '0x000C_0000',
            '  Unmapped / Reserved (255.25 MB) h=52',
            '0x1000_0000',
        ]);
    });

    it('should print nothing before a level is mounted', () => {
        assert.deepStrictEqual(new OutlineSurface().toLines(), []);
    });
});
