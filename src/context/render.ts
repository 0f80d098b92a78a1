/**
 * Markdown rendering for file blocks and the optional sections around them.
 *
 * Every block ends with "\n". Fences are always longer than any backtick run
 * inside the content, so file content can never close its own block.
 */

import type { FileEntry } from './reader.js';

export type RenderableFile = Pick<FileEntry, 'relativePath' | 'language' | 'lines'>;

export interface RenderBlockOptions {
    /** HTML anchor emitted under the header (used by the table of contents) */
    anchor?: string;
}

export function longestBacktickRun(lines: readonly string[]): number {
    let longest = 0;
    for (const line of lines) {
        const runs = line.match(/`+/g);
        if (!runs) continue;
        for (const run of runs) {
            if (run.length > longest) longest = run.length;
        }
    }
    return longest;
}

export function chooseFence(lines: readonly string[]): string {
    return '`'.repeat(Math.max(3, longestBacktickRun(lines) + 1));
}

/** Header text on one line, whatever the file name holds */
export function headerText(relativePath: string): string {
    return relativePath.replace(/[\r\n\t]/g, ' ');
}

export function renderFileBlock(file: RenderableFile, options: RenderBlockOptions = {}): string {
    const fence = chooseFence(file.lines);
    const out: string[] = [`## ${headerText(file.relativePath)}`, ''];

    if (options.anchor) {
        out.push(`<a id="${options.anchor}"></a>`, '');
    }

    out.push(`${fence}${file.language}`, ...file.lines, fence);
    return out.join('\n') + '\n';
}

export function anchorFromPath(relativePath: string): string {
    const slug = relativePath
        .toLowerCase()
        .replace(/[^a-z0-9_-]+/g, '-')
        .replace(/^-+|-+$/g, '');
    return slug || 'file';
}

/**
 * Anchors for a list of paths, made unique with a numeric suffix.
 */
export function assignAnchors(paths: readonly string[]): Map<string, string> {
    const anchors = new Map<string, string>();
    const used = new Set<string>();

    for (const p of paths) {
        const base = anchorFromPath(p);
        let anchor = base;
        let n = 2;
        while (used.has(anchor)) {
            anchor = `${base}-${n}`;
            n++;
        }
        used.add(anchor);
        anchors.set(p, anchor);
    }

    return anchors;
}

function escapeLinkText(text: string): string {
    return headerText(text).replace(/([\\[\]])/g, '\\$1');
}

export function renderTableOfContents(paths: readonly string[], anchors: ReadonlyMap<string, string>): string {
    const out = ['## Contents', ''];
    for (const p of paths) {
        out.push(`- [${escapeLinkText(p)}](#${anchors.get(p) ?? anchorFromPath(p)})`);
    }
    return out.join('\n') + '\n';
}

/** Inline code span that survives backticks in the text */
export function codeSpan(text: string): string {
    const single = headerText(text);
    const ticks = '`'.repeat(longestBacktickRun([single]) + 1);
    const pad = single.startsWith('`') || single.endsWith('`') ? ' ' : '';
    return `${ticks}${pad}${single}${pad}${ticks}`;
}

/** Binary files are listed by name only, never by content */
export function renderBinaryNote(paths: readonly string[]): string {
    const out = ['## Binary Files', '', 'Skipped (binary content):', ''];
    for (const p of paths) {
        out.push(`- ${codeSpan(p)}`);
    }
    return out.join('\n') + '\n';
}
