/**
 * @file parsercontext.ts
 * Per-line parser state and typed argument accessors used by extractors
 */

import { NormalizedPath, ResourceChecker } from '../interfaces/hostinterface';
import { DefaultsStack } from './defaults';
import { DiagnosticLocation, DiagnosticSeverity, DiagnosticsReporter, ErrorCodes } from './diagnostics';
import { Keyword, NO_KEYWORD } from './keywords';
import { ArgSpan, tokenizeLine } from './lexer';
import { NodeRef } from './noderef';
import { foldOptionChars, OptionTable } from './optionparsing';
import {
    CameraRail,
    FlareType,
    MinimassOption,
    OptionalInertia,
    RigDocument,
    RigModule,
    Submesh,
    WheelBraking,
    WheelPropulsion,
    WheelSide,
} from './rigdef';
import { SequentialImporter } from './sequentialimporter';

//#region Number Parsing

const INT_PREFIX = /^\s*[+-]?\d+/;
const FLOAT_PREFIX = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const BOOL_TRUE_PREFIXES = ['true', 'yes', '1', 'on'];

/** Leading integer of `text`, or null when there are no digits */
export function scanInt(text: string): { value: number; consumed: number } | null {
    const m = INT_PREFIX.exec(text);
    if (!m) {
        return null;
    }
    return { value: Number.parseInt(m[0], 10), consumed: m[0].length };
}

/** Leading decimal number of `text`, or null when there is none */
export function scanFloat(text: string): number | null {
    const m = FLOAT_PREFIX.exec(text);
    return m ? Number.parseFloat(m[0]) : null;
}

export function parseBool(text: string): boolean {
    const lower = text.toLowerCase();
    return BOOL_TRUE_PREFIXES.some(p => lower.startsWith(p));
}

//#endregion

const WING_CONTROL_SURFACES = 'nabferSTcdghUVij';

/** Extractor or directive handler; reads the current line from the context */
export type LineHandler = (ctx: ParserContext) => void;

/**
 * Mutable state of one parse: the line being processed, its argument spans,
 * the open block, the active module, staged sub-blocks and the defaults stack.
 */
export class ParserContext {
    line = '';
    lineNumber = 0;
    args: ArgSpan[] = [];
    /** Argument count; extractors that split the payload themselves overwrite it */
    numArgs = 0;
    /** Keyword shown in diagnostics for the current line */
    keywordName: string = NO_KEYWORD;
    currentBlock: Keyword | null = null;
    module: RigModule;
    stagedSubmesh: Submesh | null = null;
    stagedCameraRail: CameraRail | null = null;
    readonly defaults = new DefaultsStack();

    constructor(
        readonly document: RigDocument,
        readonly importer: SequentialImporter,
        private readonly reporter: DiagnosticsReporter,
        readonly sourceFile: NormalizedPath,
        readonly maxArgs: number,
        readonly resources?: ResourceChecker,
        readonly resourceGroup: string = ''
    ) {
        this.module = document.root;
    }

    //#region Line State

    /** Load a sanitized line; `tokenize` is false inside comment and description blocks */
    setLine(line: string, tokenize: boolean): void {
        this.line = line;
        this.args = tokenize ? tokenizeLine(line, this.maxArgs) : [];
        this.numArgs = this.args.length;
    }

    //#endregion

    //#region Reporting

    location(): DiagnosticLocation {
        return { line: this.lineNumber, keyword: this.keywordName, sourceFile: this.sourceFile };
    }

    error(message: string, code: string = ErrorCodes.STRUCTURAL): void {
        this.reporter.report(DiagnosticSeverity.ERROR, message, this.location(), code);
    }

    warning(message: string, code: string): void {
        this.reporter.report(DiagnosticSeverity.WARNING, message, this.location(), code);
    }

    /** Report a reference the import pass could not resolve, at the line it was read */
    unresolvedRef(ref: NodeRef): void {
        this.reporter.report(
            DiagnosticSeverity.ERROR,
            `Node '${ref.text}' not found`,
            { line: ref.lineNumber, keyword: NO_KEYWORD, sourceFile: this.sourceFile },
            ErrorCodes.NODE_REFERENCE
        );
    }

    checkNumArguments(min: number): boolean {
        if (min > this.numArgs) {
            this.warning(`Not enough arguments (got ${this.numArgs}, ${min} needed), skipping line`,
                ErrorCodes.ARGUMENT_COUNT);
            return false;
        }
        return true;
    }

    /** Fold option letters, warning about each unknown one */
    foldOptions(text: string, table: OptionTable, describeUnknown: (c: string) => string, initial: number = 0): number {
        return foldOptionChars(text, table, c => this.warning(describeUnknown(c), ErrorCodes.UNKNOWN_OPTION), initial);
    }

    /** Without a resource checker every resource is assumed present */
    resourceExists(name: string): boolean {
        return this.resources ? this.resources.exists(this.resourceGroup, name) : true;
    }

    //#endregion

    //#region String Parsers

    parseArgInt(text: string): number {
        const scanned = scanInt(text);
        if (!scanned) {
            this.error(`Cannot parse '${text.trim()}' as integer`, ErrorCodes.ARGUMENT_TYPE);
            return 0;
        }
        return scanned.value;
    }

    parseArgUint(text: string): number {
        return Math.abs(this.parseArgInt(text));
    }

    parseArgFloat(text: string): number {
        const value = scanFloat(text);
        if (value === null) {
            this.error(`Cannot parse '${text.trim()}' as float`, ErrorCodes.ARGUMENT_TYPE);
            return 0;
        }
        return value;
    }

    /**
     * Build a node reference. While sequential import is enabled the
     * reference is dual-state and buffered for the import pass.
     */
    parseNodeRef(text: string): NodeRef {
        if (this.importer.isEnabled) {
            const num = Math.abs(scanInt(text)?.value ?? 0);
            const ref = NodeRef.dual(text, num, this.lineNumber, this.importer.anyNamedNodeDefined);
            this.importer.addRef(ref);
            return ref;
        }
        return NodeRef.named(text, this.lineNumber);
    }

    //#endregion

    //#region Argument Accessors

    getArgStr(index: number): string {
        const span = this.args[index];
        return span ? this.line.substring(span.start, span.start + span.length) : '';
    }

    getArgChar(index: number): string {
        return this.getArgStr(index).charAt(0);
    }

    getArgInt(index: number): number {
        const text = this.getArgStr(index);
        const scanned = scanInt(text);
        if (!scanned) {
            this.error(`Argument [${index + 1}] is not valid integer`, ErrorCodes.ARGUMENT_TYPE);
            return 0;
        }
        if (scanned.consumed !== text.length) {
            this.warning(`Integer argument [${index + 1}] has invalid trailing characters`, ErrorCodes.ARGUMENT_TRAILING);
        }
        return scanned.value;
    }

    getArgUint(index: number): number {
        const value = this.getArgInt(index);
        if (value < 0) {
            this.error(`Argument [${index + 1}] must not be negative, using 0`, ErrorCodes.INVALID_VALUE);
            return 0;
        }
        return value;
    }

    getArgFloat(index: number): number {
        const value = scanFloat(this.getArgStr(index));
        if (value === null) {
            this.error(`Argument [${index + 1}] is not valid float`, ErrorCodes.ARGUMENT_TYPE);
            return 0;
        }
        return value;
    }

    getArgBool(index: number): boolean {
        return parseBool(this.getArgStr(index));
    }

    getArgNodeRef(index: number): NodeRef {
        return this.parseNodeRef(this.getArgStr(index));
    }

    /** `-1` means "no node" */
    getArgNullableNode(index: number): NodeRef {
        if (scanFloat(this.getArgStr(index)) === -1) {
            return NodeRef.invalid();
        }
        return this.getArgNodeRef(index);
    }

    /** `9999` means "no node" */
    getArgRigidityNode(index: number): NodeRef {
        if (this.getArgStr(index) === '9999') {
            return NodeRef.invalid();
        }
        return this.getArgNodeRef(index);
    }

    getArgWheelSide(index: number): WheelSide {
        const c = this.getArgChar(index);
        if (c === 'r') {
            return 'right';
        }
        if (c !== 'l') {
            this.warning(`Bad arg~${index + 1} 'side' (value: ${c}), parsing as 'l' for backwards compatibility.`,
                ErrorCodes.INVALID_VALUE);
        }
        return 'left';
    }

    getArgBraking(index: number): WheelBraking {
        const b = this.getArgInt(index);
        if (b >= WheelBraking.None && b <= WheelBraking.FootOnly) {
            return b;
        }
        this.error(`Bad value of param ~${index + 1} (braking), using 0 (not braked)`, ErrorCodes.INVALID_VALUE);
        return WheelBraking.None;
    }

    getArgPropulsion(index: number): WheelPropulsion {
        const p = this.getArgInt(index);
        if (p >= WheelPropulsion.None && p <= WheelPropulsion.Backward) {
            return p;
        }
        this.error(`Bad value of param ~${index + 1} (propulsion), using 0 (no propulsion)`, ErrorCodes.INVALID_VALUE);
        return WheelPropulsion.None;
    }

    getArgFlareType(index: number): FlareType {
        const c = this.getArgChar(index);
        const type = Object.values(FlareType).find(t => t === c);
        if (type) {
            return type;
        }
        this.warning(`Invalid flare type '${c}', falling back to type 'f' (front light)...`, ErrorCodes.INVALID_VALUE);
        return FlareType.Headlight;
    }

    getArgWingSurface(index: number): string {
        const text = this.getArgStr(index);
        if (text.length === 0 || !WING_CONTROL_SURFACES.includes(text.charAt(0))) {
            this.error(`Invalid argument ~${index + 1} 'control surface' (value: ${text}), ` +
                `allowed are: <${WING_CONTROL_SURFACES}>, ignoring...`, ErrorCodes.INVALID_VALUE);
            return 'n';
        }
        if (text.length > 1) {
            this.warning(`Argument ~${index + 1} 'control surface' (value: ${text}), should be only 1 letter.`,
                ErrorCodes.INVALID_VALUE);
        }
        return text.charAt(0);
    }

    /** A texture name starting with '-' means "none" */
    getArgManagedTex(index: number): string {
        const name = this.getArgStr(index);
        return name.startsWith('-') ? '' : name;
    }

    getArgMinimassOption(index: number): MinimassOption {
        const text = this.getArgStr(index);
        switch (text.charAt(0)) {
            case MinimassOption.SkipLoaded:
                return MinimassOption.SkipLoaded;
            case MinimassOption.Dummy:
                return MinimassOption.Dummy;
            default:
                this.warning(`Not a valid minimass option: ${text}, falling back to 'n' (dummy)`, ErrorCodes.INVALID_VALUE);
                return MinimassOption.Dummy;
        }
    }

    /** Fill the optional inertia fields present from `index` on */
    parseOptionalInertia(inertia: OptionalInertia, index: number): void {
        if (this.numArgs > index) { inertia.startDelayFactor = this.getArgFloat(index++); }
        if (this.numArgs > index) { inertia.stopDelayFactor = this.getArgFloat(index++); }
        if (this.numArgs > index) { inertia.startFunction = this.getArgStr(index++); }
        if (this.numArgs > index) { inertia.stopFunction = this.getArgStr(index++); }
    }

    //#endregion
}
