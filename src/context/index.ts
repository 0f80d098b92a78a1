export { validateRoot, gatherProject, projectNameOf } from './gather.js';
export type { GatherOptions, GatherResult } from './gather.js';

// Walking
export { walkProject, toPosixPath } from './walker.js';
export type { WalkEntry, WalkOptions, SkippedEntry, SkipReason } from './walker.js';

// Lookup tables
export { createFileTypes, normalizeExtension } from './file-types.js';
export type { FileTypes, FileTypeOverrides } from './file-types.js';

// Classification
export { classifyFile, classifyContent, detectLanguage, isCodeFile, isBinaryExtension, hasNullByte, decodeUtf8, BINARY_SNIFF_BYTES } from './classifier.js';
export type { Classification, ClassifiedContent } from './classifier.js';

// Truncation
export { truncateLines, splitLines, elisionMarker, DEFAULT_TRUNCATE_LINES } from './truncate.js';
export type { TruncateResult } from './truncate.js';

// File reading
export { readFiles, readEntry, readHead } from './reader.js';
export type { FileEntry, ReadResult, ReadOptions, ReadOutcome } from './reader.js';

// Rendering
export { renderFileBlock, chooseFence, anchorFromPath, assignAnchors, renderTableOfContents, renderBinaryNote, codeSpan } from './render.js';
export type { RenderableFile, RenderBlockOptions } from './render.js';

// Tree generation
export { generateTree, renderTreeSection } from './tree.js';
export type { TreeOptions } from './tree.js';

// Filtering
export { isHidden, shouldExcludeDir, createMatcher, matchesPattern, compareNames } from './filter.js';
export type { PathMatcher } from './filter.js';
