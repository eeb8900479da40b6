/**
 * @file parser.ts
 * Line-driven parser for rig definition files
 *
 * Feeds sanitized lines through the keyword dispatch table, tracks the open
 * block and the active module, and finishes with the sequential import pass.
 */

import { ConfigInterface, ConfigKey } from '../interfaces/configinterface';
import { NormalizedPath, normalizePath, ResourceChecker } from '../interfaces/hostinterface';
import {
    DiagnosticCollector,
    DiagnosticLocation,
    DiagnosticSeverity,
    DiagnosticSink,
    DiagnosticsReporter,
    ErrorCodes,
    RigDiagnostic,
} from './diagnostics';
import { KEYWORD_TABLE, RAW_BLOCK_TERMINATORS } from './keywordtable';
import { identifyKeyword, Keyword, NO_KEYWORD } from './keywords';
import { DEFAULT_MAX_ARGS, DEFAULT_MAX_LINE_LENGTH, sanitizeLine, splitLines } from './lexer';
import { ParserContext } from './parsercontext';
import { RigDocument, RigModule, ROOT_MODULE_NAME } from './rigdef';
import { SequentialImporter } from './sequentialimporter';
import { flushStagedBlocks } from './visualsections';

//#region Options and Result

/**
 * Parser settings. Unset values fall back to `config`, then to built-ins.
 */
export interface ParserOptions {
    maxLineLength?: number;
    maxArgs?: number;
    /** When false, node references are read as names only from the first line */
    sequentialImport?: boolean;
    resources?: ResourceChecker;
    resourceGroup?: string;
    sink?: DiagnosticSink;
    config?: ConfigInterface;
}

/**
 * Result of a finished parse
 */
export interface RigParseResult {
    document: RigDocument;
    diagnostics: RigDiagnostic[];
    /** True when no error was reported */
    success: boolean;
}

//#endregion

//#region Parser

/**
 * Parses one rig definition. Call `prepare()` (done by the constructor),
 * feed lines with `processLine()` / `processText()` / `processLines()`,
 * then call `finalize()` once.
 */
export class RigParser {
    private readonly collector = new DiagnosticCollector();
    private readonly reporter: DiagnosticsReporter;
    private readonly maxLineLength: number;
    private readonly maxArgs: number;
    private readonly sequentialImport: boolean;

    private ctx: ParserContext;
    private nextLineNumber = 1;
    private result: RigParseResult | null = null;

    constructor(
        private readonly sourceFile: NormalizedPath,
        private readonly options: ParserOptions = {}
    ) {
        const config = options.config;
        this.maxLineLength = options.maxLineLength
            ?? config?.getConfig(ConfigKey.ParserMaxLineLength)
            ?? DEFAULT_MAX_LINE_LENGTH;
        this.maxArgs = options.maxArgs
            ?? config?.getConfig(ConfigKey.ParserMaxArgs)
            ?? DEFAULT_MAX_ARGS;
        this.sequentialImport = options.sequentialImport
            ?? config?.getConfig(ConfigKey.ParserSequentialImport)
            ?? true;

        this.reporter = new DiagnosticsReporter(this.collector, options.sink);
        this.ctx = this.createContext();
    }

    /**
     * Parse a whole text in one call
     */
    static parse(text: string | Uint8Array, sourceFile: string, options?: ParserOptions): RigParseResult {
        const parser = new RigParser(normalizePath(sourceFile), options);
        parser.processText(text);
        return parser.finalize();
    }

    /**
     * Parse lines read from a stream. A failing read stops the parse; what
     * was read so far is still finalized.
     */
    static async parseLines(
        lines: AsyncIterable<string | Uint8Array> | Iterable<string | Uint8Array>,
        sourceFile: string,
        options?: ParserOptions
    ): Promise<RigParseResult> {
        const parser = new RigParser(normalizePath(sourceFile), options);
        await parser.processLines(lines);
        return parser.finalize();
    }

    /** The document being built */
    get document(): RigDocument {
        return this.ctx.document;
    }

    getDiagnostics(): DiagnosticCollector {
        return this.collector;
    }

    /**
     * Reset to an empty document with built-in defaults, line 1 next
     */
    prepare(): void {
        this.collector.clear();
        this.nextLineNumber = 1;
        this.result = null;
        this.ctx = this.createContext();
    }

    private createContext(): ParserContext {
        const importer = new SequentialImporter();
        if (!this.sequentialImport) {
            importer.disable();
        }
        const resourceGroup = this.options.resourceGroup
            ?? this.options.config?.getConfig(ConfigKey.ResourcesGroup)
            ?? '';
        return new ParserContext(
            new RigDocument(),
            importer,
            this.reporter,
            this.sourceFile,
            this.maxArgs,
            this.options.resources,
            resourceGroup
        );
    }

    //#region Input

    /**
     * Process one raw line. The line counter advances for every call,
     * including blank and comment lines.
     */
    processLine(raw: string | Uint8Array): void {
        const ctx = this.ctx;
        ctx.lineNumber = this.nextLineNumber++;
        if (this.result) {
            ctx.keywordName = NO_KEYWORD;
            ctx.error('Line received after the parse was finalized, ignoring...', ErrorCodes.STRUCTURAL);
            return;
        }

        const line = sanitizeLine(raw, this.maxLineLength, !this.takesVerbatimLine());
        if (line === null) {
            return;
        }
        this.processSanitizedLine(line);
    }

    processText(text: string | Uint8Array): void {
        for (const line of splitLines(text)) {
            this.processLine(line);
        }
    }

    async processLines(lines: AsyncIterable<string | Uint8Array> | Iterable<string | Uint8Array>): Promise<void> {
        try {
            for await (const line of lines) {
                this.processLine(line);
            }
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.reporter.report(
                DiagnosticSeverity.ERROR,
                `Could not read rig file: ${message}`,
                this.inputLocation(),
                ErrorCodes.INPUT_READ
            );
        }
    }

    private inputLocation(): DiagnosticLocation {
        return { line: this.nextLineNumber, keyword: NO_KEYWORD, sourceFile: this.sourceFile };
    }

    //#endregion

    //#region Dispatch

    /** Title and raw block lines keep their trailing comments */
    private takesVerbatimLine(): boolean {
        return this.ctx.document.name === '' || this.inRawBlock();
    }

    private inRawBlock(): boolean {
        const openBlock = this.ctx.currentBlock;
        const openBehavior = openBlock === null ? null : KEYWORD_TABLE[openBlock];
        return openBehavior?.kind === 'section' && openBehavior.raw === true;
    }

    private processSanitizedLine(line: string): void {
        const ctx = this.ctx;

        // The first meaningful line is the title
        if (ctx.document.name === '') {
            ctx.document.name = line;
            return;
        }

        const inRawBlock = this.inRawBlock();
        ctx.setLine(line, !inRawBlock);

        const match = identifyKeyword(line);
        if (inRawBlock) {
            if (match && RAW_BLOCK_TERMINATORS.has(match.keyword)) {
                ctx.keywordName = match.keyword;
                this.beginBlock(null);
            } else {
                this.processDataLine();
            }
            return;
        }

        if (!match) {
            this.processDataLine();
            return;
        }

        ctx.keywordName = match.keyword;
        const behavior = KEYWORD_TABLE[match.keyword];
        switch (behavior.kind) {
            case 'flag':
                ctx.document.flags[behavior.flag] = true;
                return;
            case 'directive':
                behavior.handler(ctx);
                return;
            case 'module':
                this.changeModule(match.keyword);
                return;
            case 'end':
                this.beginBlock(null);
                return;
            case 'ignored':
                return;
            case 'section':
                this.beginBlock(match.keyword);
                return;
        }
    }

    /** Hand a line without keyword to the open block's extractor, or drop it */
    private processDataLine(): void {
        const ctx = this.ctx;
        const block = ctx.currentBlock;
        if (block === null) {
            return;
        }
        ctx.keywordName = block;
        const behavior = KEYWORD_TABLE[block];
        if (behavior.kind === 'section') {
            behavior.extractor(ctx);
        }
    }

    /**
     * Close the open block (flushing staged sub-blocks) and open `keyword`,
     * or no block when null. Submesh child sections keep the submesh staged.
     */
    private beginBlock(keyword: Keyword | null): void {
        const ctx = this.ctx;
        const keepSubmesh = keyword === Keyword.TEXCOORDS || keyword === Keyword.CAB;
        flushStagedBlocks(ctx, keepSubmesh);
        if (keyword === Keyword.CAMERARAIL) {
            ctx.stagedCameraRail = { nodes: [] };
        }
        ctx.currentBlock = keyword;
    }

    private changeModule(keyword: Keyword): void {
        const ctx = this.ctx;
        let newModuleName: string;
        if (keyword === Keyword.END_SECTION) {
            if (ctx.module === ctx.document.root) {
                ctx.error("Misplaced keyword 'end_section' (already in root module), ignoring...", ErrorCodes.STRUCTURAL);
                return;
            }
            newModuleName = ROOT_MODULE_NAME;
        } else {
            // section <version> <name>; the version is unused
            if (!ctx.checkNumArguments(3)) {
                return;
            }
            newModuleName = ctx.getArgStr(2);
            if (newModuleName === ctx.module.name) {
                ctx.error('Attempt to re-enter current module, ignoring...', ErrorCodes.STRUCTURAL);
                return;
            }
        }

        this.beginBlock(null);

        if (newModuleName === ROOT_MODULE_NAME) {
            ctx.module = ctx.document.root;
            return;
        }
        let module = ctx.document.userModules.get(newModuleName);
        if (!module) {
            module = new RigModule(newModuleName);
            ctx.document.userModules.set(newModuleName, module);
        }
        ctx.module = module;
    }

    //#endregion

    /**
     * Close the open block, resolve node references and return the document.
     * Later calls return the same result.
     */
    finalize(): RigParseResult {
        if (this.result) {
            return this.result;
        }
        const ctx = this.ctx;
        ctx.keywordName = NO_KEYWORD;
        this.beginBlock(null);
        ctx.importer.process(ref => ctx.unresolvedRef(ref));

        this.result = {
            document: ctx.document,
            diagnostics: this.collector.getAll(),
            success: !this.collector.hasErrors(),
        };
        return this.result;
    }
}

//#endregion
