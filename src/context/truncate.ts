/**
 * Head/tail truncation for non-code text files. Line based, never byte based,
 * so multi-byte characters are never split.
 */

export const DEFAULT_TRUNCATE_LINES = 50;

export interface TruncateResult {
    /** Lines to render, marker included when truncated */
    lines: string[];
    truncated: boolean;
    /** Number of lines replaced by the marker */
    omitted: number;
    totalLines: number;
}

/**
 * Split text into lines. A single trailing newline does not produce an extra
 * empty line, and empty text has no lines.
 */
export function splitLines(text: string): string[] {
    if (text === '') return [];
    const lines = text.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    return lines;
}

export function assertTruncateWindow(window: number): void {
    if (!Number.isInteger(window) || window < 1) {
        throw new RangeError(`Truncation window must be a positive integer, got ${window}`);
    }
}

export function elisionMarker(omitted: number): string {
    return `... [${omitted} line${omitted === 1 ? '' : 's'} omitted] ...`;
}

/**
 * Keep everything when lines.length <= 2 * window, otherwise the first and last
 * `window` lines around one marker line.
 */
export function truncateLines(lines: readonly string[], window: number = DEFAULT_TRUNCATE_LINES): TruncateResult {
    assertTruncateWindow(window);

    const totalLines = lines.length;
    if (totalLines <= 2 * window) {
        return { lines: [...lines], truncated: false, omitted: 0, totalLines };
    }

    const omitted = totalLines - 2 * window;
    return {
        lines: [...lines.slice(0, window), elisionMarker(omitted), ...lines.slice(totalLines - window)],
        truncated: true,
        omitted,
        totalLines,
    };
}
