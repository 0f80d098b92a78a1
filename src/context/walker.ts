/**
 * Directory Walker - lazy, depth-first enumeration of candidate files.
 *
 * Entries are sorted per directory (code-unit order) so an unchanged tree
 * always yields the same sequence. Problems with single entries are reported
 * through onSkip and never stop the walk.
 */

import { readdirSync, realpathSync, statSync, type Dirent, type Stats } from 'fs';
import { join, relative, resolve, sep } from 'path';
import { errorMessage } from '../errors.js';
import { compareNames, createMatcher, isHidden, shouldExcludeDir, type PathMatcher } from './filter.js';
import type { FileTypes } from './file-types.js';

export type SkipReason =
    | 'unreadable-dir'
    | 'stat-error'
    | 'read-error'
    | 'symlink'
    | 'symlink-cycle'
    | 'empty'
    | 'not-included'
    | 'excluded'
    | 'output-file';

export interface SkippedEntry {
    /** Path relative to the project root, posix separators */
    path: string;
    reason: SkipReason;
    detail?: string;
}

export interface WalkEntry {
    /** Path relative to the project root, posix separators */
    relativePath: string;
    absolutePath: string;
    size: number;
}

export interface WalkOptions {
    fileTypes: FileTypes;
    /** When non-empty, only files matching one of these are yielded (gitignore syntax) */
    includePatterns?: string[];
    /** Patterns skipped on top of the default directory list (gitignore syntax) */
    excludePatterns?: string[];
    /** File being written by this run; never yielded */
    outputPath?: string;
    /** Descend into symlinked directories. Symlinked files are always yielded. */
    followSymlinks?: boolean;
    /** Skip zero-byte files */
    hideEmpty?: boolean;
    onSkip?: (entry: SkippedEntry) => void;
}

interface WalkContext {
    root: string;
    fileTypes: FileTypes;
    /** Undefined when no include pattern was given */
    isIncluded?: PathMatcher;
    isExcluded: PathMatcher;
    outputPath?: string;
    followSymlinks: boolean;
    hideEmpty: boolean;
    visited: Set<string>;
    skip: (path: string, reason: SkipReason, detail?: string) => void;
}

export function toPosixPath(p: string): string {
    return sep === '/' ? p : p.split(sep).join('/');
}

/**
 * Walk the project rooted at rootPath. The returned generator is single-pass.
 */
export function* walkProject(rootPath: string, options: WalkOptions): Generator<WalkEntry, void, undefined> {
    const root = resolve(rootPath);
    const onSkip = options.onSkip;

    const ctx: WalkContext = {
        root,
        fileTypes: options.fileTypes,
        isIncluded: options.includePatterns && options.includePatterns.length > 0
            ? createMatcher(options.includePatterns)
            : undefined,
        isExcluded: createMatcher(options.excludePatterns ?? []),
        outputPath: options.outputPath ? resolve(options.outputPath) : undefined,
        followSymlinks: options.followSymlinks ?? false,
        hideEmpty: options.hideEmpty ?? false,
        visited: new Set<string>(),
        skip: (path, reason, detail) => onSkip?.({ path, reason, detail }),
    };

    if (ctx.followSymlinks) {
        ctx.visited.add(realpathOrSelf(root));
    }

    yield* walkDir(root, ctx);
}

function* walkDir(dirPath: string, ctx: WalkContext): Generator<WalkEntry, void, undefined> {
    let entries: Dirent[];
    try {
        entries = readdirSync(dirPath, { withFileTypes: true });
    } catch (error) {
        ctx.skip(toPosixPath(relative(ctx.root, dirPath)) || '.', 'unreadable-dir', errorMessage(error));
        return;
    }

    entries.sort((a, b) => compareNames(a.name, b.name));

    for (const entry of entries) {
        if (isHidden(entry.name)) continue;

        const fullPath = join(dirPath, entry.name);
        const relPath = toPosixPath(relative(ctx.root, fullPath));

        let stats: Stats;
        try {
            stats = statSync(fullPath);
        } catch (error) {
            ctx.skip(relPath, 'stat-error', errorMessage(error));
            continue;
        }

        if (stats.isDirectory()) {
            if (shouldExcludeDir(entry.name, ctx.fileTypes)) continue;

            if (entry.isSymbolicLink() && !ctx.followSymlinks) {
                ctx.skip(relPath, 'symlink');
                continue;
            }

            if (ctx.isExcluded(relPath, true)) {
                ctx.skip(relPath, 'excluded');
                continue;
            }

            if (ctx.followSymlinks) {
                const real = realpathOrSelf(fullPath);
                if (ctx.visited.has(real)) {
                    ctx.skip(relPath, 'symlink-cycle');
                    continue;
                }
                ctx.visited.add(real);
            }

            yield* walkDir(fullPath, ctx);
            continue;
        }

        if (!stats.isFile()) continue;

        if (ctx.outputPath !== undefined && resolve(fullPath) === ctx.outputPath) {
            ctx.skip(relPath, 'output-file');
            continue;
        }

        if (ctx.isExcluded(relPath)) {
            ctx.skip(relPath, 'excluded');
            continue;
        }

        if (ctx.isIncluded && !ctx.isIncluded(relPath)) {
            ctx.skip(relPath, 'not-included');
            continue;
        }

        if (ctx.hideEmpty && stats.size === 0) {
            ctx.skip(relPath, 'empty');
            continue;
        }

        yield { relativePath: relPath, absolutePath: fullPath, size: stats.size };
    }
}

function realpathOrSelf(p: string): string {
    try {
        return realpathSync(p);
    } catch {
        return p;
    }
}
