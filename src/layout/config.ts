import * as fs from 'fs';
import { z } from 'zod';
import { LayoutConfigError } from '../util/errors';

export interface LayoutConfig {
    /** Extent of a gap block on the top level. */
    outerGapExtent: number;
    outerMinExtent: number;
    outerMaxExtent: number;
    /** Extent of a gap block inside an expanded block. */
    innerGapExtent: number;
    innerMinExtent: number;
    /** Space between an expanded block's edges and its nested stack. */
    innerPaddingTop: number;
    innerPaddingBottom: number;
    /** Top-level budget never drops below this, whatever the viewport. */
    minViewport: number;
    defaultViewport: number;
    redistributionLimit: number;
    relayoutMaxPasses: number;
    /** Deferred ticks between a state change and the relayout pass. */
    settleTicks: number;
    /** Deferred ticks between mounting a nested level and drawing its markers. */
    markerTicks: number;
}

export const DEFAULT_LAYOUT_CONFIG: Readonly<LayoutConfig> = {
    outerGapExtent: 52,
    outerMinExtent: 52,
    outerMaxExtent: 140,
    innerGapExtent: 44,
    innerMinExtent: 44,
    innerPaddingTop: 10,
    innerPaddingBottom: 10,
    minViewport: 320,
    defaultViewport: 900,
    redistributionLimit: 2000,
    relayoutMaxPasses: 60,
    settleTicks: 3,
    markerTicks: 2,
};

const extent = z.number().int().nonnegative();
const positive = z.number().int().positive();

const overridesSchema = z.object({
    outerGapExtent: extent,
    outerMinExtent: extent,
    outerMaxExtent: extent,
    innerGapExtent: extent,
    innerMinExtent: extent,
    innerPaddingTop: extent,
    innerPaddingBottom: extent,
    minViewport: extent,
    defaultViewport: extent,
    redistributionLimit: positive,
    relayoutMaxPasses: positive,
    settleTicks: extent,
    markerTicks: extent,
}).partial().strict();

export type LayoutConfigOverrides = z.infer<typeof overridesSchema>;

/**
 * Merge overrides (typically read from a JSON file) over the defaults.
 * Unknown keys and non-integer values are rejected.
 */
export function resolveLayoutConfig(overrides: unknown = {}): LayoutConfig {
    const result = overridesSchema.safeParse(overrides);
    if (!result.success) {
        const issue = result.error.issues[0];
        const key = issue.path.length > 0 ? issue.path.join('.') : 'config';
        throw new LayoutConfigError(`Invalid layout config (${key}): ${issue.message}`);
    }

    const config: LayoutConfig = { ...DEFAULT_LAYOUT_CONFIG, ...result.data };
    if (config.outerMinExtent > config.outerMaxExtent) {
        throw new LayoutConfigError(
            `Invalid layout config: outerMinExtent (${config.outerMinExtent}) exceeds outerMaxExtent (${config.outerMaxExtent})`
        );
    }
    return config;
}

export function loadLayoutConfig(filePath: string): LayoutConfig {
    const text = fs.readFileSync(filePath, 'utf8');
    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new LayoutConfigError(`Invalid layout config file ${filePath}: ${detail}`);
    }
    return resolveLayoutConfig(value);
}
