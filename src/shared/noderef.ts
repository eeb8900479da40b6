/**
 * @file noderef.ts
 * Node identifiers and dual-state node references
 */

//#region Node Id

/**
 * Identity of a declared node: numbered (`nodes`) or named (`nodes2`).
 */
export class NodeId {
    private constructor(
        public readonly num: number,
        public readonly name: string,
        public readonly isNamed: boolean
    ) {}

    static numbered(num: number): NodeId {
        return new NodeId(num, '', false);
    }

    static named(name: string): NodeId {
        return new NodeId(0, name, true);
    }
}

//#endregion

//#region Node Reference

/**
 * A reference to a node as written in the file.
 *
 * Until the sequential import pass has run, a reference may be valid both as
 * a numeric index and as a name. `checkNamedFirst` records that named nodes
 * existed when the reference was read, so a name match takes precedence.
 */
export class NodeRef {
    constructor(
        /** Text as written */
        public readonly text: string,
        /** Parsed number (0 for named-only references) */
        public readonly num: number,
        public lineNumber: number,
        public numericValid: boolean,
        public namedValid: boolean,
        public checkNamedFirst: boolean = false
    ) {}

    /** Reference valid in both addressing modes, pending resolution */
    static dual(text: string, num: number, lineNumber: number, checkNamedFirst: boolean): NodeRef {
        return new NodeRef(text, num, lineNumber, true, true, checkNamedFirst);
    }

    static named(text: string, lineNumber: number): NodeRef {
        return new NodeRef(text, 0, lineNumber, false, true);
    }

    /** Absent reference for optional node slots */
    static invalid(): NodeRef {
        return new NodeRef('', 0, 0, false, false);
    }

    isValidAnyState(): boolean {
        return this.numericValid || this.namedValid;
    }
}

/**
 * Inclusive range of node references, e.g. from `forset 1-5`
 */
export interface NodeRange {
    start: NodeRef;
    end: NodeRef;
}

//#endregion
