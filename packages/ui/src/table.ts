/**
 * @workdeck/ui: Column-aligned text tables.
 */

import { bold, visibleLength } from "./ansi.js";

/** Pad text on the right to `width` visible columns. ANSI codes don't count. */
export function padRight(text: string, width: number): string {
	const vLen = visibleLength(text);
	if (vLen >= width) return text;
	return text + " ".repeat(width - vLen);
}

export interface TableOptions {
	/** Bold the header row. Default: false. */
	colors?: boolean;
	/** Spaces between columns. Default: 2. */
	gap?: number;
}

/**
 * Render rows under a header, each column as wide as its widest cell.
 * The last column is not padded, so lines carry no trailing spaces.
 */
export function renderTable(
	headers: readonly string[],
	rows: readonly (readonly string[])[],
	opts: TableOptions = {},
): string[] {
	const gap = " ".repeat(opts.gap ?? 2);
	const widths = headers.map((h, col) =>
		Math.max(visibleLength(h), ...rows.map((row) => visibleLength(row[col] ?? ""))),
	);

	const line = (cells: readonly string[]) =>
		cells
			.map((cell, col) => (col === cells.length - 1 ? cell : padRight(cell, widths[col])))
			.join(gap);

	const header = line(headers);
	return [opts.colors ? bold(header) : header, ...rows.map(line)];
}
