import { DisplayItem, FlatNode } from '../models/types';
import { BoundaryMarker } from './markers';

export interface BlockView {
    readonly key: string;
    readonly item: DisplayItem;
    readonly depth: number;
    readonly drillable: boolean;
    /** An expanded block hides its label and size annotation. */
    readonly expanded: boolean;
    readonly height: number;
    readonly hint: string;
}

export interface LevelView {
    /** Key of the expanded block holding this level; null for the top level. */
    readonly ownerKey: string | null;
    readonly node: FlatNode;
    readonly depth: number;
    readonly blocks: readonly BlockView[];
}

/**
 * What the layout engine pushes to whatever draws it. Calls arrive in
 * order; the surface applies them before the next deferred tick.
 */
export interface RenderSurface {
    mountLevel(level: LevelView): void;
    unmountLevel(ownerKey: string): void;
    updateBlock(block: BlockView): void;
    renderMarkers(ownerKey: string | null, markers: readonly BoundaryMarker[]): void;
}
