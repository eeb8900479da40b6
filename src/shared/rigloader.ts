/**
 * @file rigloader.ts
 * Reads a rig file through the host, prepares resource validation and parses it
 */

import { sha256 } from 'js-sha256';
import { ConfigKey } from '../interfaces/configinterface';
import { HostInterface, normalizePath, NormalizedPath, ResourceChecker } from '../interfaces/hostinterface';
import { completeLogger, Logger } from '../server/nodehost';
import { DiagnosticCollector, DiagnosticSeverity, DiagnosticSink, DiagnosticsReporter, ErrorCodes } from './diagnostics';
import { NO_KEYWORD } from './keywords';
import { RigParser, RigParseResult } from './parser';
import { RigDocument } from './rigdef';

export interface RigLoaderOptions {
    logger?: Partial<Logger>;
    sink?: DiagnosticSink;
}

export interface RigLoadResult extends RigParseResult {
    /** Hex SHA-256 of the file bytes; empty when the file could not be read */
    sha256: string;
}

export class RigLoader {
    private readonly log: Logger;
    private resources: Promise<ResourceChecker | undefined> | null = null;

    constructor(
        private readonly host: HostInterface,
        private readonly options: RigLoaderOptions = {}
    ) {
        this.log = completeLogger(options.logger);
    }

    async load(file: string): Promise<RigLoadResult> {
        const sourceFile = normalizePath(file);
        const bytes = await this.host.readBytes(sourceFile);
        if (bytes === null) {
            this.log.error('Could not read rig file', sourceFile);
            return this.readFailure(sourceFile);
        }

        const resources = await this.getResources();
        const result = RigParser.parse(bytes, sourceFile, {
            config: this.host.config,
            resources,
            sink: this.options.sink,
        });
        this.log.info(`Parsed ${sourceFile}: ${result.diagnostics.length} diagnostics`);
        return { ...result, sha256: sha256(bytes) };
    }

    /** Without configured search paths texture validation is skipped */
    private getResources(): Promise<ResourceChecker | undefined> {
        if (!this.resources) {
            this.resources = this.buildResources();
        }
        return this.resources;
    }

    private async buildResources(): Promise<ResourceChecker | undefined> {
        const patterns = this.host.config.getConfig(ConfigKey.ResourcesSearchPaths);
        if (!patterns || patterns.length === 0 || !this.host.buildResourceIndex) {
            return undefined;
        }
        const group = this.host.config.getConfig(ConfigKey.ResourcesGroup) ?? '';
        return this.host.buildResourceIndex(group, patterns);
    }

    private readFailure(sourceFile: NormalizedPath): RigLoadResult {
        const collector = new DiagnosticCollector();
        new DiagnosticsReporter(collector, this.options.sink).report(
            DiagnosticSeverity.ERROR,
            `Could not read rig file: ${sourceFile}`,
            { line: 0, keyword: NO_KEYWORD, sourceFile },
            ErrorCodes.INPUT_READ
        );
        return {
            document: new RigDocument(),
            diagnostics: collector.getAll(),
            success: false,
            sha256: '',
        };
    }
}
