/**
 * @file index.ts
 * Public entry point of the rig definition parser
 */

export { RigParser } from './shared/parser';
export type { ParserOptions, RigParseResult } from './shared/parser';
export { RigLoader } from './shared/rigloader';
export type { RigLoaderOptions, RigLoadResult } from './shared/rigloader';
export * from './shared/rigdef';
export { NodeId, NodeRef } from './shared/noderef';
export type { NodeRange } from './shared/noderef';
export { Keyword, NO_KEYWORD, identifyKeyword } from './shared/keywords';
export { sanitizeLine, tokenizeLine, splitLines } from './shared/lexer';
export { DiagnosticCollector, DiagnosticSeverity, ErrorCodes, formatDiagnostic } from './shared/diagnostics';
export type { DiagnosticSink, RigDiagnostic } from './shared/diagnostics';
export { ConfigKey } from './interfaces/configinterface';
export type { ConfigInterface, ConfigValues } from './interfaces/configinterface';
export { normalizePath } from './interfaces/hostinterface';
export type { HostInterface, NormalizedPath, ResourceChecker } from './interfaces/hostinterface';
export { NodeHost, ResourceIndex } from './server/nodehost';
export type { NodeHostOptions, Logger } from './server/nodehost';
export { ConfigService } from './configservice';
