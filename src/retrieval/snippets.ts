import { functionKey } from '../graph/utils';
import type { CodeFile } from '../parser/types';
import type { Snippet } from './types';

export const DEFAULT_MIN_FUNCTION_LENGTH = 25;

/**
 * One snippet per function whose code has at least `minLength` characters,
 * in file order then definition order.
 */
export function buildSnippets(files: readonly CodeFile[], minLength: number = DEFAULT_MIN_FUNCTION_LENGTH): Snippet[] {
    const snippets: Snippet[] = [];
    for (const file of files) {
        for (const fn of file.functions.values()) {
            if (fn.code.length < minLength) continue;
            snippets.push({ id: functionKey(file.path, fn.name), text: fn.code });
        }
    }
    return snippets;
}
