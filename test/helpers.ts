import * as fs from 'fs';
import * as path from 'path';
import { RangeNode } from '../src/models/types';
import { flattenTree } from '../src/layout/flatten';
import { NodeIndex } from '../src/layout/nodeIndex';
import { parseDescription } from '../src/parsers/descriptionParser';

export const FIXTURES_DIR = path.join(__dirname, 'fixtures');

export function fixturePath(name: string): string {
    return path.join(FIXTURES_DIR, name);
}

export function loadFixture(name: string): RangeNode {
    return parseDescription(fs.readFileSync(fixturePath(name), 'utf-8'));
}

export function indexFixture(name: string): NodeIndex {
    return new NodeIndex(flattenTree(loadFixture(name)));
}

// Node ids of soc.json
export const SOC = {
    root: 'MEM@0x0',
    a: 'MEM@0x0/A@0x0',
    a1: 'MEM@0x0/A@0x0/A1@0x0',
    a1a: 'MEM@0x0/A@0x0/A1@0x0/A1a@0x0',
    a2: 'MEM@0x0/A@0x0/A2@0x20000',
    b: 'MEM@0x0/B@0x80000',
    gapAfterA: 'MEM@0x0/gap@262144',
    gapAfterB: 'MEM@0x0/gap@786432',
} as const;
