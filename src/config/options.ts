/**
 * Merges commander option values with a loaded config file into the typed
 * options the export pipeline runs on.
 */

import { ConfigError } from '../errors.js';
import { DEFAULT_TRUNCATE_LINES } from '../context/truncate.js';
import { DEFAULT_MODE, isMode, type Mode } from '../prompt/preamble.js';
import { isSortOrder, type SortOrder } from '../prompt/document.js';
import type { CliConfig } from './config.js';

/** Option values as commander hands them to the root action */
export interface RawCliOptions {
    output?: string;
    mode: string;
    truncateLines: string;
    include: string[];
    exclude: string[];
    codeExt: string[];
    sort: string;
    followSymlinks?: boolean;
    hideEmpty?: boolean;
    toc?: boolean;
    tree?: boolean;
    listBinary?: boolean;
    /** false when --no-clipboard is given */
    clipboard: boolean;
    configPath?: string;
    verbose?: boolean;
}

export interface ExportOptions {
    root: string;
    mode: Mode;
    /** File path or "-"; undefined means clipboard (or stdout without clipboard) */
    output?: string;
    clipboard: boolean;
    truncateLines: number;
    include: string[];
    exclude: string[];
    codeExtensions: string[];
    sort: SortOrder;
    followSymlinks: boolean;
    hideEmpty: boolean;
    toc: boolean;
    tree: boolean;
    listBinary: boolean;
    verbose: boolean;
}

export const DEFAULT_EXPORT_OPTIONS: Omit<ExportOptions, 'root'> = {
    mode: DEFAULT_MODE,
    clipboard: true,
    truncateLines: DEFAULT_TRUNCATE_LINES,
    include: [],
    exclude: [],
    codeExtensions: [],
    sort: 'path',
    followSymlinks: false,
    hideEmpty: false,
    toc: false,
    tree: false,
    listBinary: false,
    verbose: false,
};

export function parsePositiveInteger(value: string, label: string): number {
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed) || Number(trimmed) < 1) {
        throw new ConfigError(`${label} must be a positive integer. Got: ${value}`);
    }
    return Number(trimmed);
}

/**
 * Priority: CLI flags > config file > defaults. `fromCli` tells whether a value
 * was typed on the command line (commander's option value source).
 */
export function resolveExportOptions(
    root: string,
    raw: RawCliOptions,
    config: CliConfig,
    fromCli: (name: keyof RawCliOptions) => boolean
): ExportOptions {
    function pick<T>(name: keyof RawCliOptions, cliValue: T, configValue: T | undefined): T {
        if (fromCli(name) || configValue === undefined) return cliValue;
        return configValue;
    }

    const modeValue = pick<string>('mode', raw.mode, config.mode);
    if (!isMode(modeValue)) {
        throw new ConfigError(`Invalid mode "${modeValue}". Must be one of: export, ack, describe.`);
    }

    const sortValue = pick<string>('sort', raw.sort, config.sort);
    if (!isSortOrder(sortValue)) {
        throw new ConfigError(`Invalid sort "${sortValue}". Must be "path" or "name".`);
    }

    const truncateLines = fromCli('truncateLines') || config.truncateLines === undefined
        ? parsePositiveInteger(raw.truncateLines, '--truncate-lines')
        : config.truncateLines;

    return {
        root,
        mode: modeValue,
        output: pick('output', raw.output, config.output),
        clipboard: pick('clipboard', raw.clipboard, config.clipboard),
        truncateLines,
        include: pick('include', raw.include, config.include),
        exclude: pick('exclude', raw.exclude, config.exclude),
        codeExtensions: pick('codeExt', raw.codeExt, config.codeExtensions),
        sort: sortValue,
        followSymlinks: pick('followSymlinks', raw.followSymlinks ?? false, config.followSymlinks),
        hideEmpty: pick('hideEmpty', raw.hideEmpty ?? false, config.hideEmpty),
        toc: pick('toc', raw.toc ?? false, config.toc),
        tree: pick('tree', raw.tree ?? false, config.tree),
        listBinary: pick('listBinary', raw.listBinary ?? false, config.listBinary),
        verbose: pick('verbose', raw.verbose ?? false, config.verbose),
    };
}
