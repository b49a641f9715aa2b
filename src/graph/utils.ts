import * as path from 'path';

/**
 * Normalizes a file path to a canonical root-relative format (forward slashes).
 * e.g., "src\foo\bar.js" -> "src/foo/bar.js"
 */
export function normalizePath(filePath: string): string {
    return filePath.split(path.sep).join('/');
}

export const KEY_SEPARATOR = '::';

export const EXTERNAL_PREFIX = 'external';

/**
 * Function node key, also the snippet id used by vector search.
 */
export function functionKey(filePath: string, functionName: string): string {
    return `${filePath}${KEY_SEPARATOR}${functionName}`;
}

export function externalKey(callName: string): string {
    return `${EXTERNAL_PREFIX}${KEY_SEPARATOR}${callName}`;
}

export function variableKey(ownerKey: string, name: string): string {
    return `${ownerKey}${KEY_SEPARATOR}var${KEY_SEPARATOR}${name}`;
}

export function parameterKey(fnKey: string, index: number): string {
    return `${fnKey}${KEY_SEPARATOR}param${KEY_SEPARATOR}${index}`;
}

/**
 * Splits a function key back into file path and name. The name is the text
 * after the last separator, so paths containing "::" still round-trip.
 */
export function parseFunctionKey(key: string): { filePath: string; name: string } | null {
    const at = key.lastIndexOf(KEY_SEPARATOR);
    if (at <= 0) return null;
    const filePath = key.slice(0, at);
    if (filePath === EXTERNAL_PREFIX) return null;
    return { filePath, name: key.slice(at + KEY_SEPARATOR.length) };
}

export function isRelativeModule(moduleName: string): boolean {
    return moduleName.startsWith('./') || moduleName.startsWith('../') || moduleName === '.' || moduleName === '..';
}
