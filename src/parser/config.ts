/**
 * Parser Configuration
 *
 * Constants shared by the extractor, the corpus scanner and local import
 * resolution.
 */

import * as path from 'path';

// ============================================================================
// Supported Extensions
// ============================================================================

export const DEFAULT_SOURCE_EXTENSIONS = ['.js'];

/**
 * Suffixes tried, in order, when a relative require omits its extension.
 */
export const RESOLVABLE_EXTENSIONS = ['.js', '.mjs', '.cjs', '.jsx', '.ts', '.tsx', '.json'];

export function hasSourceExtension(filePath: string, extensions: readonly string[]): boolean {
    return extensions.includes(path.extname(filePath).toLowerCase());
}

// ============================================================================
// Call Classification
// ============================================================================

/**
 * Roots whose member calls (`console.log()`, `Promise.all()`) are not recorded.
 */
export const BUILTIN_ROOTS: ReadonlySet<string> = new Set([
    'console',
    'Object',
    'Array',
    'Promise',
    'this',
    'Math',
    'process',
    'Buffer',
]);

export const REQUIRE_FUNCTION = 'require';

/** Argument and literal previews longer than this are cut. */
export const PREVIEW_LENGTH = 40;

// ============================================================================
// Other Configuration
// ============================================================================

/**
 * Folders never descended into when scanning
 */
export const IGNORED_FOLDERS = new Set([
    'node_modules',
    '.git',
    '.graphrag',
    '.vscode',
    'coverage',
    'dist',
    'out',
    'build',
]);
