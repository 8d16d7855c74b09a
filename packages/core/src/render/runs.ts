/**
 * Grouping of colored cells into runs, shared by the ANSI, HTML and SVG
 * outputs.
 *
 * @module render/runs
 */

export interface ColorRun {
    text: string;
    /** `#rrggbb`, or undefined for uncolored cells */
    color: string | undefined;
}

/**
 * Split a line into maximal runs of cells with the same color.
 */
export function colorRuns(line: string, colors: ReadonlyArray<string | undefined>): ColorRun[] {
    const runs: ColorRun[] = [];
    Array.from(line).forEach((ch, i) => {
        const color = colors[i];
        const last = runs[runs.length - 1];
        if (last && last.color === color) {
            last.text += ch;
        } else {
            runs.push({ text: ch, color });
        }
    });
    return runs;
}
