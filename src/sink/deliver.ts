/**
 * Delivery of the finished document: file, stdout, or clipboard with a stdout
 * fallback. Clipboard trouble degrades the run, it never fails it.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { ClipboardUnavailableError } from '../errors.js';
import type { ClipboardSink } from './clipboard.js';

export const STDOUT_TARGET = '-';

export type Delivery =
    | { kind: 'file'; path: string }
    | { kind: 'stdout' }
    | { kind: 'clipboard'; command: string }
    | { kind: 'stdout-fallback'; reason: string; attempts: readonly string[] };

export interface DeliveryTarget {
    /** File path, or "-" for stdout. Takes precedence over the clipboard. */
    output?: string;
    /** Copy to the clipboard when no output is given */
    clipboard: boolean;
}

export interface SinkDeps {
    clipboard: ClipboardSink;
    writeStdout: (text: string) => void;
    warn: (message: string) => void;
}

/** Overwrite (or create) the file, creating parent directories */
export function writeDocumentFile(outputPath: string, document: string): string {
    const absolutePath = resolve(outputPath);
    mkdirSync(dirname(absolutePath), { recursive: true });
    writeFileSync(absolutePath, document, 'utf-8');
    return absolutePath;
}

export async function deliverDocument(document: string, target: DeliveryTarget, deps: SinkDeps): Promise<Delivery> {
    if (target.output !== undefined && target.output !== STDOUT_TARGET) {
        return { kind: 'file', path: writeDocumentFile(target.output, document) };
    }

    if (target.output === STDOUT_TARGET || !target.clipboard) {
        deps.writeStdout(document);
        return { kind: 'stdout' };
    }

    try {
        const used = await deps.clipboard.copy(document);
        return { kind: 'clipboard', command: used.command };
    } catch (error) {
        if (!(error instanceof ClipboardUnavailableError)) throw error;

        deps.warn(`Warning: clipboard unavailable (${error.message}). Writing the document to stdout instead.`);
        deps.writeStdout(document);
        return { kind: 'stdout-fallback', reason: error.message, attempts: error.attempts };
    }
}
