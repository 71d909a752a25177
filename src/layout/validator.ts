import { RangeNode, rangeEnd } from '../models/types';
import { TreeValidationError } from '../util/errors';
import { formatHex } from '../util/format';

function span(node: RangeNode): string {
    return `[${formatHex(node.start)}..${formatHex(rangeEnd(node))}]`;
}

/**
 * Check containment, sibling overlap and sibling identity over the whole tree.
 * Returns every violation found; an empty list means the tree is valid.
 */
export function validateTree(node: RangeNode, path: string = 'root'): string[] {
    const errors: string[] = [];
    const here = `${path}/${node.name}`;
    const end = rangeEnd(node);

    for (const child of node.children) {
        if (child.start < node.start || rangeEnd(child) > end) {
            errors.push(`${here}: child '${child.name}' ${span(child)} outside parent ${span(node)}`);
        }
        errors.push(...validateTree(child, here));
    }

    const kids = node.children.slice().sort((a, b) => a.start - b.start);
    for (let i = 0; i < kids.length - 1; i++) {
        const a = kids[i];
        const b = kids[i + 1];
        if (rangeEnd(a) > b.start) {
            errors.push(`${here}: overlap between '${a.name}' ${span(a)} and '${b.name}' ${span(b)}`);
        }
    }

    const seen = new Set<string>();
    for (const child of kids) {
        const key = `${child.name}@${child.start}`;
        if (seen.has(key)) {
            errors.push(`${here}: duplicate child '${child.name}' at ${formatHex(child.start)}`);
        }
        seen.add(key);
    }

    return errors;
}

export function assertValidTree(root: RangeNode): void {
    const violations = validateTree(root);
    if (violations.length > 0) {
        throw new TreeValidationError(violations);
    }
}
