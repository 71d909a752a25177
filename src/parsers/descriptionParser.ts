import { z } from 'zod';
import { RangeNode, createRangeNode } from '../models/types';
import { DescriptionError } from '../util/errors';
import { parseNumber } from '../util/format';

interface RawDescription {
    name?: string;
    start: number | string;
    size: number | string;
    children?: RawDescription[] | null;
}

const numberLike = z.union([z.number(), z.string()]);

const descriptionSchema: z.ZodType<RawDescription> = z.lazy(() =>
    z.object({
        name: z.string().optional(),
        start: numberLike,
        size: numberLike,
        children: z.array(descriptionSchema).nullable().optional(),
    })
);

function fieldPath(path: readonly (string | number)[]): string {
    let out = 'root';
    for (const segment of path) {
        out += typeof segment === 'number' ? `[${segment}]` : `.${segment}`;
    }
    return out;
}

function toNode(raw: RawDescription, path: string): RangeNode {
    const start = parseNumber(raw.start);
    if (start === undefined) {
        throw new DescriptionError(`${path}.start`, `not a non-negative integer: ${JSON.stringify(raw.start)}`);
    }
    const size = parseNumber(raw.size);
    if (size === undefined) {
        throw new DescriptionError(`${path}.size`, `not a non-negative integer: ${JSON.stringify(raw.size)}`);
    }
    if (!Number.isSafeInteger(start + size)) {
        throw new DescriptionError(path, 'range end exceeds the safe integer range');
    }

    const children = (raw.children ?? []).map((child, i) => toNode(child, `${path}.children[${i}]`));
    return createRangeNode(raw.name ?? 'Unnamed', start, size, children);
}

/**
 * Build a range tree from an already-decoded description value.
 * Throws DescriptionError naming the offending field.
 */
export function buildRangeTree(value: unknown): RangeNode {
    const result = descriptionSchema.safeParse(value);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new DescriptionError(fieldPath(issue.path), issue.message);
    }
    return toNode(result.data, 'root');
}

export function parseDescription(text: string): RangeNode {
    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new DescriptionError('root', `invalid JSON: ${detail}`);
    }
    return buildRangeTree(value);
}
