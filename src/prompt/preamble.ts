/**
 * Mode preambles. The mode only picks the instruction text at the top of the
 * document; collection and rendering never depend on it.
 */

import { codeSpan, headerText } from '../context/render.js';

export const MODES = ['export', 'ack', 'describe'] as const;

export type Mode = (typeof MODES)[number];

export const DEFAULT_MODE: Mode = 'export';

export function isMode(value: string): value is Mode {
    return (MODES as readonly string[]).includes(value);
}

export function renderPreamble(mode: Mode, projectName: string): string {
    const title = headerText(projectName);
    const name = codeSpan(projectName);

    switch (mode) {
        case 'ack':
            return [
                `# Project Context: ${title}`,
                '',
                `Read the project ${name} below. Reply only with \`OK\` and nothing else.`,
            ].join('\n') + '\n';
        case 'describe':
            return [
                `# Project Description: ${title}`,
                '',
                `Using only the files below, describe the project ${name}: its purpose, its overall structure, its main components and its main dependencies.`,
            ].join('\n') + '\n';
        case 'export':
            return [
                `# Project Export: ${title}`,
                '',
                `The content below is a full export of the project ${name}, one section per file.`,
                'Code files are included in full; long non-code text files show only their first and last lines.',
                '',
                'Treat it as the complete project and wait for further instructions before answering.',
            ].join('\n') + '\n';
    }
}
