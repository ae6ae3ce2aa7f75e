// @workdeck/ui: Terminal output

// ─── ANSI Utilities ─────────────────────────────────────────────────────────
export {
	reset,
	rgb,
	bold,
	dim,
	red,
	green,
	yellow,
	cyan,
	gray,
	swatch,
	stripAnsi,
	visibleLength,
} from "./ansi.js";

// ─── Tables ─────────────────────────────────────────────────────────────────
export { padRight, renderTable } from "./table.js";
export type { TableOptions } from "./table.js";

// ─── Doctor Report ──────────────────────────────────────────────────────────
export {
	renderReport,
	sortFindings,
	countFindings,
	configFindings,
	configFindingsReport,
} from "./report.js";
export type { DoctorReport, RenderOptions, FindingCounts } from "./report.js";
