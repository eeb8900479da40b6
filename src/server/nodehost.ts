/**
 * @file nodehost.ts
 * Filesystem HostInterface implementation for standalone use of the parser.
 * Provides byte and text reads, JSON/YAML/TOML helpers, workspace root
 * awareness and the resource index used to validate managed materials.
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import { HostInterface, NormalizedPath, normalizePath, ResourceChecker } from '../interfaces/hostinterface';
import { ConfigInterface } from '../interfaces/configinterface';
import * as yaml from 'js-yaml';
import * as toml from '@iarna/toml';

export interface Logger {
    debug: (...a: unknown[]) => void;
    info: (...a: unknown[]) => void;
    warn: (...a: unknown[]) => void;
    error: (...a: unknown[]) => void;
}

/** Fill the missing methods of a partial logger with no-ops */
export function completeLogger(logger?: Partial<Logger>): Logger {
    const noOp = (): void => {};
    return {
        debug: logger?.debug || noOp,
        info: logger?.info || noOp,
        warn: logger?.warn || noOp,
        error: logger?.error || noOp
    };
}

export interface NodeHostOptions {
    /** Workspace root directories (at least one). */
    roots: string[];
    /** Injected configuration provider. */
    config: ConfigInterface;
    /** Optional override for file system (for tests). */
    fsModule?: typeof fs;
    /** Optional logger (partial). */
    logger?: Partial<Logger>;
}

//#region Resource Index

/**
 * Resource names known per group, matched by file name
 */
export class ResourceIndex implements ResourceChecker {
    private readonly groups = new Map<string, Set<string>>();

    add(group: string, name: string): void {
        let names = this.groups.get(group);
        if (!names) {
            names = new Set<string>();
            this.groups.set(group, names);
        }
        names.add(name);
    }

    exists(group: string, name: string): boolean {
        return this.groups.get(group)?.has(name) ?? false;
    }

    /** Number of names in a group */
    size(group: string): number {
        return this.groups.get(group)?.size ?? 0;
    }
}

//#endregion

export class NodeHost implements HostInterface {
    public readonly config: ConfigInterface;
    private readonly roots: NormalizedPath[];
    private readonly fs: typeof fs;
    private readonly log: Logger;

    constructor(opts: NodeHostOptions) {
        if (!opts.roots || opts.roots.length === 0) {
            throw new Error('NodeHost requires at least one root directory');
        }
        this.config = opts.config;
        this.roots = opts.roots.map(r => normalizePath(path.resolve(r)));
        this.fs = opts.fsModule || fs;
        this.log = completeLogger(opts.logger);
    }

    // ---------------------------------------------------------------------
    async exists(p: NormalizedPath): Promise<boolean> {
        try {
            const st = await this.fs.promises.stat(p);
            return st.isFile();
        } catch { return false; }
    }

    async readFile(p: NormalizedPath): Promise<string | null> {
        try {
            return await this.fs.promises.readFile(p, 'utf8');
        } catch (err) {
            this.log.debug('readFile failed', p, err);
            return null;
        }
    }

    async readBytes(p: NormalizedPath): Promise<Uint8Array | null> {
        try {
            return await this.fs.promises.readFile(p);
        } catch (err) {
            this.log.debug('readBytes failed', p, err);
            return null;
        }
    }

    async readJSON(p: NormalizedPath): Promise<unknown> {
        const txt = await this.readFile(p);
        if (txt == null) return null;
        try {
            return JSON.parse(txt);
        } catch (err) {
            this.log.error('readJSON failed', p, err);
            return null;
        }
    }

    async readYAML(p: NormalizedPath): Promise<unknown> {
        const txt = await this.readFile(p);
        if (txt == null) return null;
        try {
            return yaml.load(txt);
        } catch (err) {
            this.log.error('readYAML failed', p, err);
            return null;
        }
    }

    async readTOML(p: NormalizedPath): Promise<unknown> {
        const txt = await this.readFile(p);
        if (txt == null) return null;
        try {
            return toml.parse(txt);
        } catch (err) {
            this.log.error('readTOML failed', p, err);
            return null;
        }
    }

    async listWorkspaceFolders(): Promise<NormalizedPath[]> { return this.roots; }

    // ---------------------------------------------------------------------
    /**
     * Index the files matched by `patterns` under `group`. Relative patterns
     * are resolved against every root; matches outside the roots are skipped.
     */
    async buildResourceIndex(group: string, patterns: string[]): Promise<ResourceIndex> {
        const index = new ResourceIndex();
        for (const raw of patterns) {
            const pattern = raw.trim();
            if (!pattern) continue;
            const bases = path.isAbsolute(pattern) ? [''] : this.roots;
            for (const base of bases) {
                const joined = base ? path.join(base, pattern) : pattern;
                const unixPattern = joined.split(path.sep).join('/');
                try {
                    const matches = await glob(unixPattern, { nodir: true, absolute: true });
                    for (const match of matches) {
                        if (this.isInsideRoots(match)) {
                            index.add(group, path.basename(match));
                        }
                    }
                } catch (err) {
                    this.log.debug('glob error', pattern, err);
                }
            }
        }
        this.log.info(`Indexed ${index.size(group)} resources in group '${group}'`);
        return index;
    }

    // ---------------------------------------------------------------------
    private isInsideRoots(absPath: string): boolean {
        const norm = path.normalize(absPath).toLowerCase();
        return this.roots.some(r => norm.startsWith(r.toLowerCase() + path.sep));
    }
}

export default NodeHost;
