/**
 * Export pipeline: gather → assemble → deliver.
 *
 * Dependencies with side effects (clipboard, stdout, logging) are injectable;
 * the CLI passes the real ones, tests pass fakes.
 */

import { createFileTypes } from './context/file-types.js';
import { gatherProject, type GatherResult } from './context/gather.js';
import { assembleDocument } from './prompt/document.js';
import { selectClipboard, type ClipboardSink } from './sink/clipboard.js';
import { deliverDocument, STDOUT_TARGET, type Delivery } from './sink/deliver.js';
import type { ExportOptions } from './config/options.js';

export interface ExportDeps {
    clipboard?: ClipboardSink;
    writeStdout?: (text: string) => void;
    /** Verbose and status lines (default: console.error) */
    log?: (message: string) => void;
    /** Degraded-mode warnings (default: console.warn) */
    warn?: (message: string) => void;
}

export interface ExportResult {
    document: string;
    delivery: Delivery;
    gather: GatherResult;
}

/**
 * Run one export. Throws ProjectRootError for a bad root; clipboard failures
 * fall back to stdout and resolve normally.
 */
export async function runExport(options: ExportOptions, deps: ExportDeps = {}): Promise<ExportResult> {
    const log = deps.log ?? ((message: string) => console.error(message));
    const warn = deps.warn ?? ((message: string) => console.warn(message));
    const writeStdout = deps.writeStdout ?? ((text: string) => { process.stdout.write(text); });

    const fileTypes = createFileTypes({ extraCodeExtensions: options.codeExtensions });

    const gather = gatherProject(options.root, {
        fileTypes,
        includePatterns: options.include,
        excludePatterns: options.exclude,
        outputPath: options.output !== undefined && options.output !== STDOUT_TARGET ? options.output : undefined,
        followSymlinks: options.followSymlinks,
        hideEmpty: options.hideEmpty,
        truncateLines: options.truncateLines,
        verbose: options.verbose,
        log,
    });

    const document = assembleDocument(gather, {
        mode: options.mode,
        projectName: gather.projectName,
        sort: options.sort,
        toc: options.toc,
        tree: options.tree,
        listBinary: options.listBinary,
    });

    const delivery = await deliverDocument(
        document,
        { output: options.output, clipboard: options.clipboard },
        {
            clipboard: deps.clipboard ?? selectClipboard(),
            writeStdout,
            warn,
        }
    );

    return { document, delivery, gather };
}

export function describeDelivery(result: ExportResult): string {
    const { delivery, gather } = result;
    const size = `${(Buffer.byteLength(result.document, 'utf-8') / 1024).toFixed(1)}KB`;
    const summary = `${gather.files.length} file(s), ${size}`;

    switch (delivery.kind) {
        case 'file':
            return `Written to ${delivery.path} (${summary})`;
        case 'clipboard':
            return `Copied to clipboard via ${delivery.command} (${summary})`;
        case 'stdout':
            return `Written to stdout (${summary})`;
        case 'stdout-fallback':
            return `Clipboard unavailable, written to stdout instead (${summary})`;
    }
}
