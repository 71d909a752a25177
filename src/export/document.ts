import { MemoryMapDocument, RangeNode, rangeEnd } from '../models/types';
import { flattenTree } from '../layout/flatten';
import { assertValidTree } from '../layout/validator';
import { TreeValidationError } from '../util/errors';

// Names may contain the id separators, so distinct paths can still collide.
function duplicateIds(nodes: readonly { id: string }[]): string[] {
    const seen = new Set<string>();
    const dups: string[] = [];
    for (const { id } of nodes) {
        if (seen.has(id)) {
            dups.push(`duplicate node id '${id}'`);
        }
        seen.add(id);
    }
    return dups;
}

/**
 * Validate and flatten a tree into the record list handed to packaging.
 * Throws TreeValidationError when the tree breaks an invariant.
 */
export function buildDocument(root: RangeNode): MemoryMapDocument {
    assertValidTree(root);
    const nodes = flattenTree(root);
    const collisions = duplicateIds(nodes);
    if (collisions.length > 0) {
        throw new TreeValidationError(collisions);
    }
    return {
        root: {
            id: nodes[0].id,
            name: root.name,
            start: root.start,
            size: root.size,
            end: rangeEnd(root),
        },
        nodes,
    };
}

export function serializeDocument(doc: MemoryMapDocument, indent?: number): string {
    return JSON.stringify(doc, null, indent);
}
