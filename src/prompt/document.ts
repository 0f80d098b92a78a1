/**
 * Document Assembler - preamble, optional sections, then one block per file.
 * The document is built entirely in memory before any sink sees it.
 */

import { posix } from 'path';
import { compareNames } from '../context/filter.js';
import { assignAnchors, renderBinaryNote, renderFileBlock, renderTableOfContents } from '../context/render.js';
import { renderTreeSection } from '../context/tree.js';
import type { FileEntry } from '../context/reader.js';
import { renderPreamble, type Mode } from './preamble.js';

export const SORT_ORDERS = ['path', 'name'] as const;

export type SortOrder = (typeof SORT_ORDERS)[number];

export function isSortOrder(value: string): value is SortOrder {
    return (SORT_ORDERS as readonly string[]).includes(value);
}

export interface AssembleOptions {
    mode: Mode;
    /** Shown in the preamble and as the tree root */
    projectName: string;
    /** "path" keeps walk order, "name" orders by base name (default: path) */
    sort?: SortOrder;
    /** Add a linked table of contents */
    toc?: boolean;
    /** Add a project structure tree */
    tree?: boolean;
    /** List binary files by name after the file blocks */
    listBinary?: boolean;
}

export interface AssembleInput {
    files: readonly FileEntry[];
    binaryFiles: readonly string[];
}

export function sortFiles<T extends { relativePath: string }>(files: readonly T[], order: SortOrder): T[] {
    if (order === 'path') return [...files];

    return [...files].sort((a, b) => {
        const byName = compareNames(
            posix.basename(a.relativePath).toLowerCase(),
            posix.basename(b.relativePath).toLowerCase()
        );
        return byName !== 0 ? byName : compareNames(a.relativePath, b.relativePath);
    });
}

export function assembleDocument(input: AssembleInput, options: AssembleOptions): string {
    const files = sortFiles(input.files, options.sort ?? 'path');
    const paths = files.map(f => f.relativePath);
    const anchors = options.toc ? assignAnchors(paths) : undefined;

    const sections: string[] = [renderPreamble(options.mode, options.projectName)];

    if (anchors && files.length > 0) {
        sections.push(renderTableOfContents(paths, anchors));
    }

    if (options.tree && files.length > 0) {
        sections.push(renderTreeSection(options.projectName, paths));
    }

    for (const file of files) {
        sections.push(renderFileBlock(file, { anchor: anchors?.get(file.relativePath) }));
    }

    if (options.listBinary && input.binaryFiles.length > 0) {
        sections.push(renderBinaryNote(input.binaryFiles));
    }

    return sections.join('\n');
}
