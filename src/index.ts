export * from './models/types';
export { DescriptionError, LayoutConfigError, TreeValidationError } from './util/errors';
export { formatAddress, formatHex, formatSize, parseNumber } from './util/format';
export { buildRangeTree, parseDescription } from './parsers/descriptionParser';
export { validateTree, assertValidTree } from './layout/validator';
export { flattenTree, nodeId } from './layout/flatten';
export { NodeIndex } from './layout/nodeIndex';
export { buildDisplayItems, synthesizeGaps } from './layout/gaps';
export {
    computeHeightsToFit,
    computeCompactHeights,
    minimumExtent,
    topLevelBudget,
} from './layout/heights';
export type { HeightAllocation, SizedItem } from './layout/heights';
export {
    DEFAULT_LAYOUT_CONFIG,
    loadLayoutConfig,
    resolveLayoutConfig,
} from './layout/config';
export type { LayoutConfig, LayoutConfigOverrides } from './layout/config';
export { computeBoundaryMarkers } from './layout/markers';
export type { BoundaryMarker, PositionedItem } from './layout/markers';
export type { BlockView, LevelView, RenderSurface } from './layout/surface';
export { ImmediateScheduler, ManualScheduler, afterTicks } from './layout/scheduler';
export type { Scheduler } from './layout/scheduler';
export { ExpansionController } from './layout/expansion';
export { buildDocument, serializeDocument } from './export/document';
export { OutlineSurface } from './providers/outlineSurface';
export { renderOutline } from './cli';
