/**
 * Classifier - binary / code / text, per file.
 *
 * Binary evidence always wins over the code allow-list: a ".ts" file holding a
 * NUL byte or invalid UTF-8 is still binary and never rendered.
 */

import { posix } from 'path';
import type { FileTypes } from './file-types.js';

export type Classification = 'binary' | 'code' | 'text';

/** How many leading bytes are scanned for a NUL byte */
export const BINARY_SNIFF_BYTES = 8000;

export interface ClassifiedContent {
    classification: Classification;
    /** Decoded text; empty for binary files */
    text: string;
}

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

export function fileExtension(relativePath: string): string {
    return posix.extname(posix.basename(relativePath)).toLowerCase();
}

export function hasNullByte(bytes: Uint8Array, limit: number = BINARY_SNIFF_BYTES): boolean {
    const end = Math.min(bytes.length, limit);
    for (let i = 0; i < end; i++) {
        if (bytes[i] === 0) return true;
    }
    return false;
}

/**
 * Strict UTF-8 decode. Returns undefined when the bytes are not valid UTF-8.
 * A leading BOM is dropped.
 */
export function decodeUtf8(bytes: Uint8Array): string | undefined {
    try {
        return strictUtf8.decode(bytes);
    } catch {
        return undefined;
    }
}

/** Decided from the path alone, before any byte is read */
export function isBinaryExtension(relativePath: string, fileTypes: FileTypes): boolean {
    return fileTypes.binaryExtensions.has(fileExtension(relativePath));
}

export function isCodeFile(relativePath: string, fileTypes: FileTypes): boolean {
    const name = posix.basename(relativePath);
    if (fileTypes.codeFileNames.has(name)) return true;
    return fileTypes.codeExtensions.has(fileExtension(relativePath));
}

/**
 * Classify a file and decode it in one pass.
 */
export function classifyContent(
    relativePath: string,
    bytes: Uint8Array,
    fileTypes: FileTypes
): ClassifiedContent {
    if (isBinaryExtension(relativePath, fileTypes)) {
        return { classification: 'binary', text: '' };
    }

    if (hasNullByte(bytes)) {
        return { classification: 'binary', text: '' };
    }

    // U+0000 is valid UTF-8, so a NUL past the sniff window survives decoding
    const text = decodeUtf8(bytes);
    if (text === undefined || text.includes('\u0000')) {
        return { classification: 'binary', text: '' };
    }

    return {
        classification: isCodeFile(relativePath, fileTypes) ? 'code' : 'text',
        text,
    };
}

export function classifyFile(relativePath: string, bytes: Uint8Array, fileTypes: FileTypes): Classification {
    return classifyContent(relativePath, bytes, fileTypes).classification;
}

/** Markdown fence info string for a path ('' when unknown) */
export function detectLanguage(relativePath: string, fileTypes: FileTypes): string {
    const name = posix.basename(relativePath);
    const special = fileTypes.codeFileNames.get(name);
    if (special !== undefined) return special;
    return fileTypes.languages.get(fileExtension(relativePath)) ?? '';
}
