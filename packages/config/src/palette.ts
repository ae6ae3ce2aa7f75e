/**
 * Project colors: `#RRGGBB` or one of a fixed set of names.
 */

/** RGB channels in 0..1. */
export interface ProjectColorRGB {
	readonly red: number;
	readonly green: number;
	readonly blue: number;
}

const rgb = (red: number, green: number, blue: number): ProjectColorRGB => Object.freeze({ red, green, blue });

const NAMED_COLORS: ReadonlyMap<string, ProjectColorRGB> = new Map([
	["black", rgb(0, 0, 0)],
	["blue", rgb(0, 0, 1)],
	["brown", rgb(0.6471, 0.1647, 0.1647)],
	["cyan", rgb(0, 1, 1)],
	["gray", rgb(0.502, 0.502, 0.502)],
	["grey", rgb(0.502, 0.502, 0.502)],
	["green", rgb(0, 0.502, 0)],
	["indigo", rgb(0.2941, 0, 0.5098)],
	["orange", rgb(1, 0.6471, 0)],
	["pink", rgb(1, 0.7529, 0.7961)],
	["purple", rgb(0.502, 0, 0.502)],
	["red", rgb(1, 0, 0)],
	["teal", rgb(0, 0.502, 0.502)],
	["white", rgb(1, 1, 1)],
	["yellow", rgb(1, 1, 0)],
]);

/** Sorted palette names. */
export const PROJECT_COLOR_NAMES: readonly string[] = Object.freeze([...NAMED_COLORS.keys()].sort());

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

export function isValidHexColor(value: string): boolean {
	return HEX_COLOR.test(value);
}

export function isNamedColor(value: string): boolean {
	return NAMED_COLORS.has(value.toLowerCase());
}

/** Resolve a hex or named color (case-insensitive, trimmed). */
export function resolveProjectColor(value: string): ProjectColorRGB | undefined {
	const trimmed = value.trim();
	if (isValidHexColor(trimmed)) {
		const n = Number.parseInt(trimmed.slice(1), 16);
		return rgb(((n >> 16) & 0xff) / 255, ((n >> 8) & 0xff) / 255, (n & 0xff) / 255);
	}
	return NAMED_COLORS.get(trimmed.toLowerCase());
}

/** Uppercase `#RRGGBB` for a project color, e.g. for editor theming. */
export function projectColorHex(value: string): string | undefined {
	const color = resolveProjectColor(value);
	if (color === undefined) return undefined;
	const channel = (c: number) => Math.round(c * 255).toString(16).toUpperCase().padStart(2, "0");
	return `#${channel(color.red)}${channel(color.green)}${channel(color.blue)}`;
}
