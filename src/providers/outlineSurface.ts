import { BoundaryMarker } from '../layout/markers';
import { BlockView, LevelView, RenderSurface } from '../layout/surface';
import { formatSize } from '../util/format';

interface MountedLevel {
    readonly ownerKey: string | null;
    readonly depth: number;
    readonly keys: readonly string[];
}

/**
 * Headless rendering surface. Keeps the latest geometry and markers pushed by
 * the layout engine and prints them as an indented outline:
 *
 *   0x0000_0000
 *     BOOT (256.00 KB) h=140 [+]
 *   0x0004_0000
 */
export class OutlineSurface implements RenderSurface {
    private readonly levels = new Map<string | null, MountedLevel>();
    private readonly blocks = new Map<string, BlockView>();
    private readonly markers = new Map<string | null, readonly BoundaryMarker[]>();

    mountLevel(level: LevelView): void {
        this.levels.set(level.ownerKey, {
            ownerKey: level.ownerKey,
            depth: level.depth,
            keys: level.blocks.map(b => b.key),
        });
        for (const block of level.blocks) {
            this.blocks.set(block.key, block);
        }
        this.markers.delete(level.ownerKey);
    }

    unmountLevel(ownerKey: string): void {
        const level = this.levels.get(ownerKey);
        if (!level) { return; }
        for (const key of level.keys) {
            this.blocks.delete(key);
        }
        this.levels.delete(ownerKey);
        this.markers.delete(ownerKey);
    }

    updateBlock(block: BlockView): void {
        this.blocks.set(block.key, block);
    }

    renderMarkers(ownerKey: string | null, markers: readonly BoundaryMarker[]): void {
        this.markers.set(ownerKey, markers);
    }

    block(key: string): BlockView | undefined {
        return this.blocks.get(key);
    }

    markersOf(ownerKey: string | null): readonly BoundaryMarker[] {
        return this.markers.get(ownerKey) ?? [];
    }

    isMounted(ownerKey: string | null): boolean {
        return this.levels.has(ownerKey);
    }

    toLines(): string[] {
        const lines: string[] = [];
        this.renderLevel(null, lines);
        return lines;
    }

    private renderLevel(ownerKey: string | null, lines: string[]): void {
        const level = this.levels.get(ownerKey);
        if (!level) { return; }

        const indent = '  '.repeat(level.depth);
        const markers = new Map<number, BoundaryMarker>();
        for (const marker of this.markersOf(ownerKey)) {
            markers.set(marker.y, marker);
        }
        const emitMarker = (y: number): void => {
            const marker = markers.get(Math.round(y));
            if (marker) {
                lines.push(indent + marker.label);
            }
        };

        let top = 0;
        for (const key of level.keys) {
            const block = this.blocks.get(key);
            if (!block) { continue; }
            emitMarker(top);
            lines.push(`${indent}  ${describeBlock(block)}`);
            if (block.expanded) {
                this.renderLevel(block.key, lines);
            }
            top += block.height;
        }
        emitMarker(top);
    }
}

function describeBlock(block: BlockView): string {
    const toggle = block.expanded ? ' [-]' : block.drillable ? ' [+]' : '';
    const size = block.expanded ? '' : ` (${formatSize(block.item.size)})`;
    return `${block.item.name}${size} h=${block.height}${toggle}`;
}
