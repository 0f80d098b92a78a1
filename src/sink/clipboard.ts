/**
 * Clipboard sinks, one per platform, selected once at startup.
 *
 * Each sink pipes the document into a native clipboard command. Candidates
 * are tried in order; when none works the sink throws
 * ClipboardUnavailableError and the caller picks another delivery.
 */

import { execa } from 'execa';
import { ClipboardUnavailableError, errorMessage } from '../errors.js';

export const CLIPBOARD_TIMEOUT_MS = 10_000;

export interface ClipboardCommand {
    command: string;
    args: readonly string[];
}

/** Runs one command with `input` on stdin; rejects on spawn failure or non-zero exit */
export type CommandRunner = (command: string, args: readonly string[], input: string) => Promise<void>;

export const runCommand: CommandRunner = async (command, args, input) => {
    // stdout/stderr ignored: xclip keeps inherited pipes open after forking
    await execa(command, args, {
        input,
        stdout: 'ignore',
        stderr: 'ignore',
        timeout: CLIPBOARD_TIMEOUT_MS,
    });
};

export interface ClipboardSink {
    readonly platform: string;
    /** Candidate commands, in the order they are tried */
    readonly commands: readonly ClipboardCommand[];
    /** Copy text; resolves with the command that succeeded */
    copy(text: string): Promise<ClipboardCommand>;
}

abstract class CommandClipboard implements ClipboardSink {
    abstract readonly platform: string;
    abstract readonly commands: readonly ClipboardCommand[];

    constructor(private readonly run: CommandRunner = runCommand) {}

    async copy(text: string): Promise<ClipboardCommand> {
        const attempts: string[] = [];

        for (const candidate of this.commands) {
            try {
                await this.run(candidate.command, candidate.args, text);
                return candidate;
            } catch (error) {
                attempts.push(`${candidate.command}: ${errorMessage(error)}`);
            }
        }

        const names = this.commands.map(c => c.command).join(', ');
        throw new ClipboardUnavailableError(`No clipboard command succeeded (tried ${names})`, attempts);
    }
}

export class MacClipboard extends CommandClipboard {
    readonly platform = 'darwin';
    readonly commands: readonly ClipboardCommand[] = [{ command: 'pbcopy', args: [] }];
}

export class WindowsClipboard extends CommandClipboard {
    readonly platform = 'win32';
    readonly commands: readonly ClipboardCommand[] = [{ command: 'clip', args: [] }];
}

/** Wayland first, then the two common X11 tools */
export class LinuxClipboard extends CommandClipboard {
    readonly platform = 'linux';
    readonly commands: readonly ClipboardCommand[] = [
        { command: 'wl-copy', args: [] },
        { command: 'xclip', args: ['-selection', 'clipboard'] },
        { command: 'xsel', args: ['--clipboard', '--input'] },
    ];
}

export function selectClipboard(platform: NodeJS.Platform = process.platform, run: CommandRunner = runCommand): ClipboardSink {
    switch (platform) {
        case 'darwin':
            return new MacClipboard(run);
        case 'win32':
            return new WindowsClipboard(run);
        default:
            return new LinuxClipboard(run);
    }
}
