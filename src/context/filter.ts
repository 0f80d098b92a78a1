/**
 * Context Filter - decides which walked entries reach the reader.
 *
 * 1. Hidden entries (leading dot) are always dropped.
 * 2. Well-known dependency/build directories (FileTypes.excludedDirectories).
 * 3. User patterns, gitignore syntax: "dist" matches that name at any depth,
 *    "*.lock" any file suffix, "src/*.ts" is anchored at the root, "**" spans
 *    directories and "!" re-includes. Case-insensitive.
 */

import ignore from 'ignore';
import type { FileTypes } from './file-types.js';

export function isHidden(name: string): boolean {
    return name.startsWith('.');
}

/**
 * Should the walker refuse to descend into this directory?
 */
export function shouldExcludeDir(dirName: string, fileTypes: FileTypes): boolean {
    if (isHidden(dirName)) return true;
    return fileTypes.excludedDirectories.has(dirName);
}

/** Tests a root-relative posix path (a file, or a directory when isDirectory is set) */
export type PathMatcher = (relativePath: string, isDirectory?: boolean) => boolean;

/**
 * Compile patterns once for a whole walk. With no usable pattern the matcher
 * never matches. A path matches when it, or one of its parent directories,
 * matches.
 */
export function createMatcher(patterns: readonly string[]): PathMatcher {
    const usable = patterns.map(p => p.trim()).filter(p => p.length > 0 && !p.startsWith('#'));
    if (usable.length === 0) return () => false;

    const ig = ignore({ ignorecase: true }).add(usable);

    return (relativePath, isDirectory = false) => {
        const normalized = relativePath.replace(/\\/g, '/').replace(/^\/+|\/+$/g, '');
        if (!normalized) return false;
        return ig.ignores(isDirectory ? `${normalized}/` : normalized);
    };
}

/**
 * One-off check of a relative file path against patterns.
 */
export function matchesPattern(relativePath: string, patterns: readonly string[]): boolean {
    return createMatcher(patterns)(relativePath);
}

/**
 * Code-unit comparison of entry names. Locale-independent so two machines
 * produce the same order.
 */
export function compareNames(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
