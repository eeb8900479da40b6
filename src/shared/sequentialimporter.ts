/**
 * @file sequentialimporter.ts
 * Resolution of node references for files that predate named nodes
 *
 * Older rig files address nodes by their position in the declaration order,
 * which includes nodes generated by wheels and cinecams. Because the file
 * format version is only known once it has been read, references are kept
 * in both states until the end of the parse and resolved here.
 */

import { GeneratedNodeRange } from './rigdef';
import { NodeRef } from './noderef';

/** Element that receives the id range of the nodes generated for it */
export interface GeneratedNodeOwner {
    generatedNodes?: GeneratedNodeRange;
}

interface PendingRange {
    first: number;
    count: number;
    owner: GeneratedNodeOwner;
}

export type UnresolvedRefHandler = (ref: NodeRef) => void;

const NUMERIC_TEXT = /^\s*[+-]?\d/;

export class SequentialImporter {
    private enabled = true;
    private processed = false;
    private readonly numbered = new Set<number>();
    private readonly named = new Set<string>();
    private readonly generated: PendingRange[] = [];
    private readonly refs: NodeRef[] = [];
    private highestId = -1;
    private previousNumber: number | null = null;

    get isEnabled(): boolean { return this.enabled; }

    get anyNamedNodeDefined(): boolean { return this.named.size > 0; }

    /** Switch to named-only addressing; nothing recorded so far is dropped */
    disable(): void {
        this.enabled = false;
    }

    /**
     * Record a numbered node. Returns the number that was expected when
     * `num` does not follow the previously declared one, otherwise null.
     */
    addNumberedNode(num: number): number | null {
        const expected = this.previousNumber === null ? null : this.previousNumber + 1;
        this.previousNumber = num;
        this.numbered.add(num);
        this.highestId = Math.max(this.highestId, num);
        return expected !== null && expected !== num ? expected : null;
    }

    addNamedNode(name: string): void {
        this.named.add(name);
    }

    /** Reserve `count` ids after the highest id seen so far */
    addGeneratedNodes(count: number, owner: GeneratedNodeOwner): GeneratedNodeRange {
        const range = { first: this.highestId + 1, count };
        this.generated.push({ ...range, owner });
        this.highestId += count;
        return range;
    }

    /** Buffer a dual-state reference for resolution */
    addRef(ref: NodeRef): void {
        this.refs.push(ref);
    }

    /** True when the number is a declared node or falls in a generated block */
    isKnownNumber(num: number): boolean {
        if (this.numbered.has(num)) {
            return true;
        }
        return this.generated.some(r => num >= r.first && num < r.first + r.count);
    }

    /**
     * Resolve every buffered reference to a single state. Runs once;
     * later calls do nothing.
     */
    process(onUnresolved: UnresolvedRefHandler): void {
        if (this.processed) {
            return;
        }
        this.processed = true;

        for (const range of this.generated) {
            range.owner.generatedNodes = { first: range.first, count: range.count };
        }

        const namedMode = !this.enabled || (this.named.size > 0 && this.numbered.size === 0);
        for (const ref of this.refs) {
            if (namedMode) {
                ref.numericValid = false;
                continue;
            }
            this.resolveLegacy(ref, onUnresolved);
        }
    }

    private resolveLegacy(ref: NodeRef, onUnresolved: UnresolvedRefHandler): void {
        if (ref.checkNamedFirst && this.named.has(ref.text)) {
            ref.numericValid = false;
            ref.namedValid = true;
            return;
        }
        if (NUMERIC_TEXT.test(ref.text) && this.isKnownNumber(ref.num)) {
            ref.numericValid = true;
            ref.namedValid = false;
            return;
        }
        if (this.named.has(ref.text)) {
            ref.numericValid = false;
            ref.namedValid = true;
            return;
        }
        // An unknown number still reads as numeric
        ref.numericValid = NUMERIC_TEXT.test(ref.text);
        ref.namedValid = false;
        onUnresolved(ref);
    }
}
