/**
 * JavaScript Parser Module
 *
 * Tree-sitter based extraction of functions, calls, requires and variables
 * from CommonJS sources.
 */

export { JavaScriptExtractor, SyntaxErrorInSource, scanExportedNames } from './extractor';
export type { ExtractorOptions } from './extractor';
