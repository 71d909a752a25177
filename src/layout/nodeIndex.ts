import { FlatNode } from '../models/types';

const NO_CHILDREN: readonly FlatNode[] = [];

/**
 * Lookup tables over a flattened node list, built once:
 * id → node and parent id → children ordered by start.
 */
export class NodeIndex {
    readonly root: FlatNode;
    private readonly byId = new Map<string, FlatNode>();
    private readonly byParent = new Map<string, FlatNode[]>();

    constructor(nodes: readonly FlatNode[]) {
        let root: FlatNode | undefined;

        for (const node of nodes) {
            if (this.byId.has(node.id)) {
                throw new Error(`Duplicate node id '${node.id}'`);
            }
            this.byId.set(node.id, node);

            if (node.parent === null) {
                if (root) {
                    throw new Error(`Multiple root nodes: '${root.id}' and '${node.id}'`);
                }
                root = node;
                continue;
            }
            const siblings = this.byParent.get(node.parent);
            if (siblings) {
                siblings.push(node);
            } else {
                this.byParent.set(node.parent, [node]);
            }
        }

        if (!root) {
            throw new Error('Node list has no root');
        }
        this.root = root;

        for (const siblings of this.byParent.values()) {
            siblings.sort((a, b) => a.start - b.start);
        }
    }

    get(id: string): FlatNode | undefined {
        return this.byId.get(id);
    }

    childrenOf(id: string): readonly FlatNode[] {
        return this.byParent.get(id) ?? NO_CHILDREN;
    }

    hasChildren(id: string): boolean {
        return this.childrenOf(id).length > 0;
    }

    get size(): number {
        return this.byId.size;
    }
}
