import { describe, it, expect, vi } from 'vitest';
import { ClipboardUnavailableError } from '../../../src/errors.js';
import {
  LinuxClipboard,
  MacClipboard,
  WindowsClipboard,
  selectClipboard,
  type CommandRunner,
} from '../../../src/sink/clipboard.js';

describe('selectClipboard', () => {
  const run: CommandRunner = async () => {};

  it('picks one sink per platform', () => {
    expect(selectClipboard('darwin', run)).toBeInstanceOf(MacClipboard);
    expect(selectClipboard('win32', run)).toBeInstanceOf(WindowsClipboard);
    expect(selectClipboard('linux', run)).toBeInstanceOf(LinuxClipboard);
  });

  it('treats other platforms like Linux', () => {
    expect(selectClipboard('freebsd', run).platform).toBe('linux');
  });

  it('tries Wayland before X11 on Linux', () => {
    expect(selectClipboard('linux', run).commands.map(c => c.command)).toEqual(['wl-copy', 'xclip', 'xsel']);
  });
});

describe('CommandClipboard.copy', () => {
  it('pipes the text into the platform command', async () => {
    const run = vi.fn<CommandRunner>(async () => {});
    const used = await new MacClipboard(run).copy('hello');

    expect(used.command).toBe('pbcopy');
    expect(run).toHaveBeenCalledWith('pbcopy', [], 'hello');
  });

  it('falls through to the next command on failure', async () => {
    const run = vi.fn<CommandRunner>(async command => {
      if (command === 'wl-copy') throw new Error('spawn wl-copy ENOENT');
    });
    const used = await new LinuxClipboard(run).copy('hello');

    expect(used).toEqual({ command: 'xclip', args: ['-selection', 'clipboard'] });
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('throws ClipboardUnavailableError when every command fails', async () => {
    const run: CommandRunner = async command => {
      throw new Error(`spawn ${command} ENOENT`);
    };
    const copy = new LinuxClipboard(run).copy('hello');

    await expect(copy).rejects.toBeInstanceOf(ClipboardUnavailableError);
    await expect(copy).rejects.toMatchObject({
      message: 'No clipboard command succeeded (tried wl-copy, xclip, xsel)',
      attempts: [
        'wl-copy: spawn wl-copy ENOENT',
        'xclip: spawn xclip ENOENT',
        'xsel: spawn xsel ENOENT',
      ],
    });
  });
});
