/**
 * @file hostinterface.ts
 * Host-side services the loader needs: file access and resource lookup
 */
import * as path from "path";
import { ConfigInterface } from "./configinterface";

//=============================================================================
declare const __NormalizedPathBrand: unique symbol;
export type NormalizedPath = string & { readonly [__NormalizedPathBrand]: true };

export function normalizePath(filePath: string): NormalizedPath {
    return path.normalize(filePath) as NormalizedPath;
}

//=============================================================================
export interface HostInterface {
    /** Central configuration provider (framework-agnostic). */
    config: ConfigInterface;
    exists(p: NormalizedPath): Promise<boolean>;

    readFile(p: NormalizedPath): Promise<string | null>;
    readBytes(p: NormalizedPath): Promise<Uint8Array | null>;
    readJSON(p: NormalizedPath): Promise<unknown>;
    readYAML(p: NormalizedPath): Promise<unknown>;
    readTOML(p: NormalizedPath): Promise<unknown>;

    listWorkspaceFolders?(): Promise<NormalizedPath[]>; // optional for non-workspace hosts
    /** Index resource files matching `patterns` under `group`; optional for hosts without resources */
    buildResourceIndex?(group: string, patterns: string[]): Promise<ResourceChecker>;
}

//=============================================================================
/**
 * Answers whether a named resource (texture, mesh) exists in a resource group.
 * Lookups are synchronous: the parser calls it from inside line processing.
 */
export interface ResourceChecker {
    exists(group: string, name: string): boolean;
}
