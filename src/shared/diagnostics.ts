/**
 * @file diagnostics.ts
 * Diagnostic types, collection and reporting for the rig definition parser
 */

import { NormalizedPath } from "../interfaces/hostinterface";

//#region Diagnostic Types

/**
 * Diagnostic severity levels
 */
export enum DiagnosticSeverity {
    ERROR = 0,    // Element or field was dropped or defaulted
    WARNING = 1   // Suspicious but processable
}

/**
 * A single parse diagnostic, tied to the line and keyword being processed
 */
export interface RigDiagnostic {
    severity: DiagnosticSeverity;
    message: string;
    line: number;
    /** Keyword (or open block) in effect when the diagnostic was raised */
    keyword: string;
    sourceFile: NormalizedPath;
    code?: string;
}

/**
 * Location information for creating diagnostics
 */
export interface DiagnosticLocation {
    line: number;
    keyword: string;
    sourceFile: NormalizedPath;
}

/**
 * Receiver of formatted diagnostic text. Supplied by the embedding application.
 */
export interface DiagnosticSink {
    report(severity: DiagnosticSeverity, text: string): void;
}

//#endregion

//#region Diagnostic Collector

/**
 * Collects diagnostics during parsing
 */
export class DiagnosticCollector {
    private diagnostics: RigDiagnostic[] = [];

    /**
     * Add a diagnostic directly
     */
    add(diagnostic: RigDiagnostic): void {
        this.diagnostics.push(diagnostic);
    }

    /**
     * Check if any errors have been collected
     */
    hasErrors(): boolean {
        return this.diagnostics.some(d => d.severity === DiagnosticSeverity.ERROR);
    }

    getAll(): RigDiagnostic[] {
        return [...this.diagnostics];
    }

    clear(): void {
        this.diagnostics = [];
    }
}

//#endregion

//#region Reporter

/**
 * Formats a diagnostic the way it is shown to users:
 * `<file>:<line> (<keyword>): <message>`
 */
export function formatDiagnostic(location: DiagnosticLocation, message: string): string {
    return `${location.sourceFile}:${location.line} (${location.keyword}): ${message}`;
}

/**
 * Front end used by the parser. Records every diagnostic and forwards the
 * formatted text to an optional sink. Never throws.
 */
export class DiagnosticsReporter {
    constructor(
        private readonly collector: DiagnosticCollector,
        private readonly sink?: DiagnosticSink
    ) {}

    report(severity: DiagnosticSeverity, message: string, location: DiagnosticLocation, code?: string): void {
        this.collector.add({
            severity,
            message,
            line: location.line,
            keyword: location.keyword,
            sourceFile: location.sourceFile,
            code,
        });
        if (!this.sink) {
            return;
        }
        try {
            this.sink.report(severity, formatDiagnostic(location, message));
        } catch (error) {
            console.error('Diagnostic sink failed:', error);
        }
    }
}

//#endregion

//#region Error Codes

/**
 * Standard error codes for rig parser diagnostics
 */
export const ErrorCodes = {
    // Structural errors (RIG prefix)
    STRUCTURAL: "RIG001",

    // Argument errors (ARG prefix)
    ARGUMENT_COUNT: "ARG001",
    ARGUMENT_TYPE: "ARG002",
    ARGUMENT_TRAILING: "ARG003",

    // Option / attribute errors (OPT prefix)
    UNKNOWN_OPTION: "OPT001",
    UNKNOWN_ATTRIBUTE: "OPT002",

    // Value errors (VAL prefix)
    INVALID_VALUE: "VAL001",

    // Resource errors (RES prefix)
    RESOURCE_MISSING: "RES001",

    // Node reference errors (NODE prefix)
    NODE_REFERENCE: "NODE001",

    // Input errors (IO prefix)
    INPUT_READ: "IO001",
} as const;

//#endregion
