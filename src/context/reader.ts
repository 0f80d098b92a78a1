/**
 * File Reader - reads walked entries, classifies them and applies the
 * truncation policy. A file that cannot be read is reported and skipped.
 *
 * Binary files are settled by extension or by their first BINARY_SNIFF_BYTES;
 * only files that pass both are read in full.
 */

import { closeSync, openSync, readFileSync, readSync } from 'fs';
import { errorMessage } from '../errors.js';
import {
    BINARY_SNIFF_BYTES,
    classifyContent,
    detectLanguage,
    hasNullByte,
    isBinaryExtension,
    type Classification,
} from './classifier.js';
import { DEFAULT_TRUNCATE_LINES, assertTruncateWindow, splitLines, truncateLines } from './truncate.js';
import type { FileTypes } from './file-types.js';
import type { SkippedEntry, WalkEntry } from './walker.js';

export interface FileEntry {
    /** Path relative to the project root, posix separators */
    relativePath: string;
    absolutePath: string;
    /** File size in bytes */
    size: number;
    classification: Exclude<Classification, 'binary'>;
    /** Markdown fence language ('' when unknown) */
    language: string;
    /** Lines to render; for truncated text files this includes the elision marker */
    lines: string[];
    truncated: boolean;
    omittedLines: number;
}

export interface ReadOptions {
    fileTypes: FileTypes;
    /** Head/tail window for text files (default: 50) */
    truncateLines?: number;
    onSkip?: (entry: SkippedEntry) => void;
}

export interface ReadResult {
    files: FileEntry[];
    /** Relative paths of files classified binary, in walk order */
    binaryFiles: string[];
    /** Total bytes of the files included */
    totalSize: number;
}

export type ReadOutcome =
    | { kind: 'file'; file: FileEntry }
    | { kind: 'binary'; path: string };

/** First `length` bytes of a file (fewer when the file is shorter) */
export function readHead(absolutePath: string, length: number = BINARY_SNIFF_BYTES): Buffer {
    const fd = openSync(absolutePath, 'r');
    try {
        const buffer = Buffer.alloc(length);
        const bytesRead = readSync(fd, buffer, 0, length, 0);
        return buffer.subarray(0, bytesRead);
    } finally {
        closeSync(fd);
    }
}

/**
 * Read and classify one entry. Throws when the file cannot be read.
 */
export function readEntry(entry: WalkEntry, fileTypes: FileTypes, window: number = DEFAULT_TRUNCATE_LINES): ReadOutcome {
    if (isBinaryExtension(entry.relativePath, fileTypes) || hasNullByte(readHead(entry.absolutePath))) {
        return { kind: 'binary', path: entry.relativePath };
    }

    const bytes = readFileSync(entry.absolutePath);
    const { classification, text } = classifyContent(entry.relativePath, bytes, fileTypes);

    if (classification === 'binary') {
        return { kind: 'binary', path: entry.relativePath };
    }

    const allLines = splitLines(text);
    const rendered = classification === 'text'
        ? truncateLines(allLines, window)
        : { lines: allLines, truncated: false, omitted: 0 };

    return {
        kind: 'file',
        file: {
            relativePath: entry.relativePath,
            absolutePath: entry.absolutePath,
            size: bytes.length,
            classification,
            language: detectLanguage(entry.relativePath, fileTypes),
            lines: rendered.lines,
            truncated: rendered.truncated,
            omittedLines: rendered.omitted,
        },
    };
}

/**
 * Read every entry of a walk. Per-file failures are contained to that file
 * and reported through onSkip as 'read-error'.
 */
export function readFiles(entries: Iterable<WalkEntry>, options: ReadOptions): ReadResult {
    const window = options.truncateLines ?? DEFAULT_TRUNCATE_LINES;
    assertTruncateWindow(window);
    const files: FileEntry[] = [];
    const binaryFiles: string[] = [];

    for (const entry of entries) {
        let outcome: ReadOutcome;
        try {
            outcome = readEntry(entry, options.fileTypes, window);
        } catch (error) {
            options.onSkip?.({ path: entry.relativePath, reason: 'read-error', detail: errorMessage(error) });
            continue;
        }

        if (outcome.kind === 'binary') {
            binaryFiles.push(outcome.path);
        } else {
            files.push(outcome.file);
        }
    }

    return {
        files,
        binaryFiles,
        totalSize: files.reduce((sum, f) => sum + f.size, 0),
    };
}
