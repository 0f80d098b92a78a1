/**
 * CLI Config File Support
 *
 * One JSON file can carry every export option:
 * - Output (mode, output, clipboard)
 * - Collection (include, exclude, codeExtensions, followSymlinks, hideEmpty)
 * - Rendering (truncateLines, sort, toc, tree, listBinary)
 * - Misc (verbose)
 *
 * All fields optional. Priority: CLI flags > config file > hardcoded defaults.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname, isAbsolute } from 'path';
import { ConfigError } from '../errors.js';
import { isMode, type Mode } from '../prompt/preamble.js';
import { isSortOrder, type SortOrder } from '../prompt/document.js';
import { STDOUT_TARGET } from '../sink/deliver.js';

export const DEFAULT_CONFIG_FILE = 'promptdump.config.json';

export interface CliConfig {
    // Output
    mode?: Mode;
    output?: string;
    clipboard?: boolean;

    // Collection
    include?: string[];
    exclude?: string[];
    codeExtensions?: string[];
    followSymlinks?: boolean;
    hideEmpty?: boolean;

    // Rendering
    truncateLines?: number;
    sort?: SortOrder;
    toc?: boolean;
    tree?: boolean;
    listBinary?: boolean;

    // Misc
    verbose?: boolean;
}

// ── Validation helpers ──────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>([
    'mode', 'output', 'clipboard',
    'include', 'exclude', 'codeExtensions', 'followSymlinks', 'hideEmpty',
    'truncateLines', 'sort', 'toc', 'tree', 'listBinary',
    'verbose',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertString(obj: Record<string, unknown>, key: string): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new ConfigError(`Config "${key}" must be a string`);
    return val;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const val = obj[key];
    if (typeof val !== 'boolean') throw new ConfigError(`Config "${key}" must be a boolean`);
    return val;
}

function assertPositiveInteger(obj: Record<string, unknown>, key: string): number {
    const val = obj[key];
    if (typeof val !== 'number' || !Number.isInteger(val) || val < 1) {
        throw new ConfigError(`Config "${key}" must be a positive integer`);
    }
    return val;
}

function assertStringArray(obj: Record<string, unknown>, key: string): string[] {
    const val = obj[key];
    if (!Array.isArray(val)) {
        throw new ConfigError(`Config "${key}" must be an array of strings`);
    }
    const strings: string[] = [];
    for (const item of val) {
        if (typeof item !== 'string') throw new ConfigError(`Config "${key}" must be an array of strings`);
        strings.push(item);
    }
    return strings;
}

// ── Main loader ─────────────────────────────────────────────────────────────

/**
 * Load and validate a CLI config file.
 *
 * - Resolves configPath relative to CWD
 * - A relative "output" resolves from the config file's directory ("-" stays stdout)
 * - Throws ConfigError on missing file, invalid JSON or wrong value types
 */
export function loadConfig(configPath: string): CliConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch (error) {
        throw new ConfigError(`Failed to read config file: ${absolutePath}`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new ConfigError(`Invalid JSON in config file: ${absolutePath}`, { cause: error });
    }

    if (!isRecord(parsed)) {
        throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
    }

    const obj = parsed;

    // Warn about unknown keys
    const unknownKeys = Object.keys(obj).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: CliConfig = {};
    const configDir = dirname(absolutePath);

    // Output
    if (obj.mode !== undefined) {
        const mode = assertString(obj, 'mode');
        if (!isMode(mode)) throw new ConfigError(`Config "mode" must be one of: export, ack, describe. Got: ${mode}`);
        config.mode = mode;
    }
    if (obj.output !== undefined) {
        const output = assertString(obj, 'output');
        config.output = output === STDOUT_TARGET || isAbsolute(output) ? output : resolve(configDir, output);
    }
    if (obj.clipboard !== undefined) config.clipboard = assertBoolean(obj, 'clipboard');

    // Collection
    if (obj.include !== undefined) config.include = assertStringArray(obj, 'include');
    if (obj.exclude !== undefined) config.exclude = assertStringArray(obj, 'exclude');
    if (obj.codeExtensions !== undefined) config.codeExtensions = assertStringArray(obj, 'codeExtensions');
    if (obj.followSymlinks !== undefined) config.followSymlinks = assertBoolean(obj, 'followSymlinks');
    if (obj.hideEmpty !== undefined) config.hideEmpty = assertBoolean(obj, 'hideEmpty');

    // Rendering
    if (obj.truncateLines !== undefined) config.truncateLines = assertPositiveInteger(obj, 'truncateLines');
    if (obj.sort !== undefined) {
        const sort = assertString(obj, 'sort');
        if (!isSortOrder(sort)) throw new ConfigError(`Config "sort" must be "path" or "name". Got: ${sort}`);
        config.sort = sort;
    }
    if (obj.toc !== undefined) config.toc = assertBoolean(obj, 'toc');
    if (obj.tree !== undefined) config.tree = assertBoolean(obj, 'tree');
    if (obj.listBinary !== undefined) config.listBinary = assertBoolean(obj, 'listBinary');

    // Misc
    if (obj.verbose !== undefined) config.verbose = assertBoolean(obj, 'verbose');

    return config;
}

// ── Default template ────────────────────────────────────────────────────────

/**
 * Default config template for `init` command.
 * Shows every available option with its default value.
 */
export const CONFIG_TEMPLATE: CliConfig = {
    // Output
    mode: 'export',
    clipboard: true,

    // Collection
    include: [],
    exclude: ['coverage', '*.lock'],
    codeExtensions: [],
    followSymlinks: false,
    hideEmpty: false,

    // Rendering
    truncateLines: 50,
    sort: 'path',
    toc: false,
    tree: false,
    listBinary: false,

    // Misc
    verbose: false,
};
