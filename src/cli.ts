#!/usr/bin/env node

/**
 * promptdump CLI
 *
 * Export a project directory as one Markdown prompt, to the clipboard, a file or stdout.
 */

import { Command } from 'commander';
import { writeFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { createRequire } from 'module';
import { loadConfig, CONFIG_TEMPLATE, DEFAULT_CONFIG_FILE, type CliConfig } from './config/config.js';
import { resolveExportOptions, type RawCliOptions } from './config/options.js';
import { DEFAULT_TRUNCATE_LINES } from './context/truncate.js';
import { errorMessage } from './errors.js';
import { describeDelivery, runExport } from './export.js';
import { DEFAULT_MODE } from './prompt/preamble.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

const collect = (value: string, previous: string[]): string[] => previous.concat([value]);

program
    .name('promptdump')
    .description('Export a project directory as a single Markdown prompt')
    .version(pkg.version);

/**
 * Default action - export the project
 */
program
    .argument('[root]', 'Project root directory', '.')
    .option('-o, --output <path>', 'Write the document to this file instead of the clipboard ("-" for stdout)')
    .option('--mode <mode>', 'Preamble: export, ack, describe', DEFAULT_MODE)
    .option('--truncate-lines <n>', 'Head/tail lines kept for non-code text files', String(DEFAULT_TRUNCATE_LINES))
    .option('--include <pattern>', 'Only export files matching a gitignore-style pattern (can be used multiple times)', collect, [] as string[])
    .option('--exclude <pattern>', 'Skip files/dirs matching a gitignore-style pattern (can be used multiple times)', collect, [] as string[])
    .option('--code-ext <ext>', 'Extra extension always rendered in full (can be used multiple times)', collect, [] as string[])
    .option('--sort <order>', 'File order: path (walk order) or name', 'path')
    .option('--follow-symlinks', 'Descend into symlinked directories')
    .option('--hide-empty', 'Skip empty files')
    .option('--toc', 'Add a table of contents')
    .option('--tree', 'Add a project structure tree')
    .option('--list-binary', 'List skipped binary files by name')
    .option('--no-clipboard', 'Do not copy to the clipboard; print to stdout')
    .option('--config-path <path>', 'Path to config JSON file')
    .option('--verbose', 'Verbose output')
    .action(async (root: string, rawOptions: RawCliOptions, command: Command) => {
        try {
            let config: CliConfig = {};
            if (rawOptions.configPath) {
                config = loadConfig(rawOptions.configPath);
            }

            const options = resolveExportOptions(
                root,
                rawOptions,
                config,
                name => command.getOptionValueSource(name) === 'cli'
            );

            if (options.verbose) {
                console.error('promptdump');
                if (rawOptions.configPath) console.error(`  Config: ${resolve(rawOptions.configPath)}`);
                console.error(`  Mode: ${options.mode}`);
                console.error(`  Truncate: ${options.truncateLines} head/tail lines`);
            }

            const result = await runExport(options);
            console.error(describeDelivery(result));
        } catch (error) {
            console.error('Error:', errorMessage(error));
            process.exit(1);
        }
    });

/**
 * Init command - create a starter config file
 */
program
    .command('init')
    .description('Create a starter config file')
    .argument('[path]', 'Output path for config file', DEFAULT_CONFIG_FILE)
    .action((outputPath: string) => {
        try {
            const absolutePath = resolve(outputPath);
            if (existsSync(absolutePath)) {
                console.error(`Error: File already exists: ${absolutePath}`);
                console.error('Delete it first or choose a different path.');
                process.exit(1);
            }
            const content = JSON.stringify(CONFIG_TEMPLATE, null, 2) + '\n';
            writeFileSync(absolutePath, content, 'utf-8');
            console.log(`Created config file: ${absolutePath}`);
            console.log(`Use it with: promptdump --config-path ${outputPath}`);
        } catch (error) {
            console.error('Error:', errorMessage(error));
            process.exit(1);
        }
    });

// Parse arguments and run
await program.parseAsync();
