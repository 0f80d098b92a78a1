/**
 * Context Gatherer - full collection pipeline:
 *
 * 1. Validate the project root (the only fatal input error)
 * 2. Walk the tree (hidden + well-known dirs + user patterns filtered out)
 * 3. Read, classify and truncate each file as it is walked
 *
 * Rendering is left to the caller (see prompt/document.ts).
 */

import { readdirSync, statSync } from 'fs';
import { basename, resolve } from 'path';
import { ProjectRootError, errorMessage } from '../errors.js';
import { createFileTypes, type FileTypes } from './file-types.js';
import { readFiles, type FileEntry } from './reader.js';
import { walkProject, type SkippedEntry } from './walker.js';

export interface GatherOptions {
  /** Lookup tables (default: createFileTypes()) */
  fileTypes?: FileTypes;
  /** Only files matching one of these are exported */
  includePatterns?: string[];
  /** Extra gitignore-style patterns to skip */
  excludePatterns?: string[];
  /** File this run writes to; never collected */
  outputPath?: string;
  followSymlinks?: boolean;
  hideEmpty?: boolean;
  /** Head/tail window for text files (default: 50) */
  truncateLines?: number;
  /** Verbose logging */
  verbose?: boolean;
  /** Where verbose lines go (default: console.error, stdout may carry the document) */
  log?: (message: string) => void;
}

export interface GatherResult {
  /** Absolute project root */
  root: string;
  /** Root directory base name */
  projectName: string;
  files: FileEntry[];
  /** Relative paths of binary files, in walk order */
  binaryFiles: string[];
  /** Entries skipped by the walker or the reader */
  skipped: SkippedEntry[];
  /** Total bytes of included files */
  totalSize: number;
  timing: {
    totalMs: number;
  };
}

/**
 * Resolve the root and make sure it is a readable directory.
 */
export function validateRoot(rootPath: string): string {
  const abs = resolve(rootPath);

  let isDirectory: boolean;
  try {
    isDirectory = statSync(abs).isDirectory();
  } catch {
    throw new ProjectRootError(`Project root does not exist: ${rootPath}\nResolved to: ${abs}`, abs);
  }

  if (!isDirectory) {
    throw new ProjectRootError(`Project root is not a directory: ${rootPath}\nResolved to: ${abs}`, abs);
  }

  try {
    readdirSync(abs);
  } catch (error) {
    throw new ProjectRootError(`Project root is not readable: ${abs} (${errorMessage(error)})`, abs);
  }

  return abs;
}

export function projectNameOf(root: string): string {
  return basename(root) || root;
}

export function gatherProject(rootPath: string, options: GatherOptions = {}): GatherResult {
  const start = Date.now();
  const { verbose = false } = options;
  const log = options.log ?? ((message: string) => console.error(message));

  const root = validateRoot(rootPath);
  const fileTypes = options.fileTypes ?? createFileTypes();
  const skipped: SkippedEntry[] = [];

  const recordSkip = (entry: SkippedEntry): void => {
    skipped.push(entry);
    if (verbose) {
      log(`  Skipped ${entry.path} (${entry.reason}${entry.detail ? `: ${entry.detail}` : ''})`);
    }
  };

  if (verbose) {
    log(`  Root: ${root}`);
    if (options.includePatterns && options.includePatterns.length > 0) {
      log(`  Includes: ${options.includePatterns.join(', ')}`);
    }
    if (options.excludePatterns && options.excludePatterns.length > 0) {
      log(`  Excludes: ${options.excludePatterns.join(', ')}`);
    }
  }

  const entries = walkProject(root, {
    fileTypes,
    includePatterns: options.includePatterns,
    excludePatterns: options.excludePatterns,
    outputPath: options.outputPath,
    followSymlinks: options.followSymlinks,
    hideEmpty: options.hideEmpty,
    onSkip: recordSkip,
  });

  const result = readFiles(entries, {
    fileTypes,
    truncateLines: options.truncateLines,
    onSkip: recordSkip,
  });

  const totalMs = Date.now() - start;

  if (verbose) {
    const truncated = result.files.filter(f => f.truncated).length;
    log(`  Read ${result.files.length} files (${(result.totalSize / 1024).toFixed(1)}KB), ${truncated} truncated, in ${totalMs}ms`);
    log(`  Binary: ${result.binaryFiles.length}, skipped: ${skipped.length}`);
  }

  return {
    root,
    projectName: projectNameOf(root),
    files: result.files,
    binaryFiles: result.binaryFiles,
    skipped,
    totalSize: result.totalSize,
    timing: { totalMs },
  };
}
