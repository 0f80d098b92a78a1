/**
 * File Types - the immutable lookup tables the walker and classifier work from.
 *
 * Defaults live in file-types.json. Built once per run by createFileTypes()
 * and handed to the pipeline explicitly.
 */

import defaults from './file-types.json' with { type: 'json' };

export interface FileTypes {
    /** Directory names never descended into */
    readonly excludedDirectories: ReadonlySet<string>;
    /** Lower-cased extensions (with dot) rendered in full */
    readonly codeExtensions: ReadonlySet<string>;
    /** Exact file names rendered in full, mapped to their fence language */
    readonly codeFileNames: ReadonlyMap<string, string>;
    /** Lower-cased extensions classified binary without reading content */
    readonly binaryExtensions: ReadonlySet<string>;
    /** Lower-cased extension -> fence language */
    readonly languages: ReadonlyMap<string, string>;
}

export interface FileTypeOverrides {
    /** Extra code extensions, with or without the leading dot */
    extraCodeExtensions?: string[];
}

export function normalizeExtension(ext: string): string {
    const trimmed = ext.trim().toLowerCase();
    if (!trimmed) return '';
    return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

export function createFileTypes(overrides: FileTypeOverrides = {}): FileTypes {
    const codeExtensions = new Set<string>(defaults.codeExtensions.map(normalizeExtension));
    for (const ext of overrides.extraCodeExtensions ?? []) {
        const normalized = normalizeExtension(ext);
        if (normalized) codeExtensions.add(normalized);
    }

    const fileTypes: FileTypes = {
        excludedDirectories: new Set<string>(defaults.excludedDirectories),
        codeExtensions,
        codeFileNames: new Map<string, string>(Object.entries(defaults.codeFileNames)),
        binaryExtensions: new Set<string>(defaults.binaryExtensions.map(normalizeExtension)),
        languages: new Map<string, string>(Object.entries(defaults.languages)),
    };

    return Object.freeze(fileTypes);
}
