/**
 * Directory Tree - ASCII tree of the exported files.
 *
 * Built from the collected relative paths rather than a second walk, so it
 * shows exactly what the document contains.
 */

import { compareNames } from './filter.js';
import { chooseFence } from './render.js';

export interface TreeOptions {
  /** Max lines before truncating (default: 1000) */
  maxItems?: number;
}

interface TreeNode {
  dirs: Map<string, TreeNode>;
  files: string[];
}

function emptyNode(): TreeNode {
  return { dirs: new Map(), files: [] };
}

function buildNodes(paths: readonly string[]): TreeNode {
  const root = emptyNode();
  for (const p of paths) {
    const parts = p.split('/').filter(Boolean);
    const fileName = parts.pop();
    if (fileName === undefined) continue;

    let node = root;
    for (const part of parts) {
      let child = node.dirs.get(part);
      if (!child) {
        child = emptyNode();
        node.dirs.set(part, child);
      }
      node = child;
    }
    node.files.push(fileName);
  }
  return root;
}

/**
 * Render `rootLabel/` followed by its tree. Directories come before files,
 * each group sorted by name.
 */
export function generateTree(rootLabel: string, paths: readonly string[], options: TreeOptions = {}): string {
  const { maxItems = 1000 } = options;
  const lines: string[] = [`${rootLabel}/`];
  let totalItems = 0;

  for (const line of treeHelper(buildNodes(paths), '')) {
    lines.push(line);
    totalItems++;
    if (totalItems >= maxItems) {
      lines.push(`... (truncated at ${maxItems} items)`);
      break;
    }
  }

  return lines.join('\n');
}

function* treeHelper(node: TreeNode, prefix: string): Generator<string> {
  const dirNames = [...node.dirs.keys()].sort(compareNames);
  const fileNames = [...node.files].sort(compareNames);
  const entries: { name: string; child?: TreeNode }[] = [
    ...dirNames.map(name => ({ name, child: node.dirs.get(name) })),
    ...fileNames.map(name => ({ name })),
  ];

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    const isLast = i === entries.length - 1;
    const connector = isLast ? '└── ' : '├── ';
    const childPrefix = isLast ? '    ' : '│   ';

    if (entry.child) {
      yield `${prefix}${connector}${entry.name}/`;
      yield* treeHelper(entry.child, `${prefix}${childPrefix}`);
    } else {
      yield `${prefix}${connector}${entry.name}`;
    }
  }
}

/** Tree wrapped as a Markdown section */
export function renderTreeSection(rootLabel: string, paths: readonly string[], options: TreeOptions = {}): string {
  const tree = generateTree(rootLabel, paths, options);
  const fence = chooseFence(tree.split('\n'));
  return `## Project Structure\n\n${fence}\n${tree}\n${fence}\n`;
}
