/**
 * @workdeck/ui: ANSI escape code utilities for terminal output.
 *
 * Colors and styles using standard ANSI escape sequences, plus stripping
 * for measuring and comparing rendered text.
 */

const ESC = "\x1b[";

/** ANSI reset escape sequence -- clears all styles. */
export const reset = `${ESC}0m`;

/**
 * Set foreground to true-color RGB.
 * @param r - Red channel (0-255).
 * @param g - Green channel (0-255).
 * @param b - Blue channel (0-255).
 */
export function rgb(r: number, g: number, b: number): string {
	return `${ESC}38;2;${r};${g};${b}m`;
}

// ─── Style Wrappers ─────────────────────────────────────────────────────────

/** Wrap text in bold ANSI style. */
export function bold(s: string): string {
	return `${ESC}1m${s}${ESC}22m`;
}

/** Wrap text in dim (faint) ANSI style. */
export function dim(s: string): string {
	return `${ESC}2m${s}${ESC}22m`;
}

// ─── Named Color Presets ────────────────────────────────────────────────────

export function red(s: string): string {
	return `${ESC}31m${s}${reset}`;
}

export function green(s: string): string {
	return `${ESC}32m${s}${reset}`;
}

export function yellow(s: string): string {
	return `${ESC}33m${s}${reset}`;
}

export function cyan(s: string): string {
	return `${ESC}36m${s}${reset}`;
}

/** Gray (bright black). */
export function gray(s: string): string {
	return `${ESC}90m${s}${reset}`;
}

// ─── Swatches ───────────────────────────────────────────────────────────────

/**
 * A colored block for a `#RRGGBB` color.
 * Returns the plain block when `hex` is not a six-digit hex color.
 */
export function swatch(hex: string, block = "■"): string {
	const match = /^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/.exec(hex);
	if (!match) return block;
	const [, r, g, b] = match;
	return `${rgb(Number.parseInt(r, 16), Number.parseInt(g, 16), Number.parseInt(b, 16))}${block}${reset}`;
}

// ─── ANSI Stripping ─────────────────────────────────────────────────────────

// biome-ignore lint: complex regex needed for full ANSI stripping
const ANSI_RE = /\x1b\[[0-9;]*[a-zA-Z]|\x1b\].*?(?:\x07|\x1b\\)/g;

/** Remove all ANSI escape sequences from a string */
export function stripAnsi(s: string): string {
	return s.replace(ANSI_RE, "");
}

/** Get visible length of a string (excluding ANSI codes) */
export function visibleLength(s: string): number {
	return stripAnsi(s).length;
}
