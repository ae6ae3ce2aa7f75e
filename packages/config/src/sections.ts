/**
 * Parsers for the global sections: `[app]`, `[agentLayer]`, `[chrome]`, `[layout]`.
 *
 * Each is independent of the others. An absent section yields its defaults
 * record without a finding; a section that is present but not a table yields
 * a FAIL finding and its defaults.
 *
 * `[chrome]` and `[layout]` fall back as a whole: if any bound or format check
 * fails, the section is replaced by its defaults record and the fields that
 * did validate are dropped. A field whose reader rejected its type falls back
 * to its own default without affecting its siblings.
 */

import type { DocTable } from "./document.js";
import { fail, warn } from "./findings.js";
import {
	readOptionalBool,
	readOptionalInteger,
	readOptionalNumber,
	readOptionalString,
	readOptionalStringArray,
	validateUrls,
} from "./readers.js";
import {
	DEFAULT_AGENT_LAYER_CONFIG,
	DEFAULT_APP_CONFIG,
	DEFAULT_CHROME_CONFIG,
	DEFAULT_LAYOUT_CONFIG,
} from "./types.js";
import type {
	AgentLayerConfig,
	AppConfig,
	ChromeConfig,
	Finding,
	IdePosition,
	Justification,
	LayoutConfig,
} from "./types.js";

// ─── Known Keys ──────────────────────────────────────────────────────────────

export const KNOWN_TOP_LEVEL_KEYS: ReadonlySet<string> = new Set(["app", "agentLayer", "chrome", "layout", "project"]);
export const KNOWN_APP_KEYS: ReadonlySet<string> = new Set(["autoStartAtLogin"]);
export const KNOWN_AGENT_LAYER_KEYS: ReadonlySet<string> = new Set(["enabled"]);
export const KNOWN_CHROME_KEYS: ReadonlySet<string> = new Set(["pinnedTabs", "defaultTabs", "openGitRemote"]);
export const KNOWN_LAYOUT_KEYS: ReadonlySet<string> = new Set([
	"smallScreenThreshold",
	"windowHeight",
	"maxWindowWidth",
	"idePosition",
	"justification",
	"maxGap",
]);

/**
 * One WARN finding per unrecognized key, in sorted key order.
 *
 * @param section - Label used in the title: `"top-level"`, `"[chrome]"`, `"[[project]]"`.
 */
export function checkUnknownKeys(
	table: DocTable,
	knownKeys: ReadonlySet<string>,
	section: string,
	findings: Finding[],
): void {
	const known = [...knownKeys].sort().join(", ");
	const unknown = [...table.keys()].filter((key) => !knownKeys.has(key)).sort();
	for (const key of unknown) {
		findings.push(warn(`Unrecognized ${section} config key: ${key}`, {
			fix: `Remove '${key}' from config.toml. Known ${section} keys are: ${known}.`,
		}));
	}
}

/**
 * The section's table, or undefined when the section is absent or malformed.
 * Unknown keys inside the table are reported here.
 */
function openSection(
	root: DocTable,
	name: string,
	knownKeys: ReadonlySet<string>,
	findings: Finding[],
): DocTable | undefined {
	const value = root.get(name);
	if (value === undefined) return undefined;
	if (value.kind !== "table") {
		findings.push(fail(`[${name}] must be a table`, { fix: `Use [${name}] as a TOML table section.` }));
		return undefined;
	}
	checkUnknownKeys(value.table, knownKeys, `[${name}]`, findings);
	return value.table;
}

// ─── [app] ───────────────────────────────────────────────────────────────────

export function parseAppSection(root: DocTable, findings: Finding[]): AppConfig {
	const table = openSection(root, "app", KNOWN_APP_KEYS, findings);
	if (!table) return DEFAULT_APP_CONFIG;

	return Object.freeze({
		autoStartAtLogin: readOptionalBool(table, "autoStartAtLogin", false, "app.autoStartAtLogin", findings),
	});
}

// ─── [agentLayer] ────────────────────────────────────────────────────────────

export function parseAgentLayerSection(root: DocTable, findings: Finding[]): AgentLayerConfig {
	const table = openSection(root, "agentLayer", KNOWN_AGENT_LAYER_KEYS, findings);
	if (!table) return DEFAULT_AGENT_LAYER_CONFIG;

	return Object.freeze({
		enabled: readOptionalBool(table, "enabled", false, "agentLayer.enabled", findings),
	});
}

// ─── [chrome] ────────────────────────────────────────────────────────────────

export function parseChromeSection(root: DocTable, findings: Finding[]): ChromeConfig {
	const table = openSection(root, "chrome", KNOWN_CHROME_KEYS, findings);
	if (!table) return DEFAULT_CHROME_CONFIG;

	const pinnedTabs = readOptionalStringArray(table, "pinnedTabs", "chrome.pinnedTabs", findings);
	const pinnedValid = validateUrls(pinnedTabs, "chrome.pinnedTabs", findings);

	const defaultTabs = readOptionalStringArray(table, "defaultTabs", "chrome.defaultTabs", findings);
	const defaultValid = validateUrls(defaultTabs, "chrome.defaultTabs", findings);

	const openGitRemote = readOptionalBool(table, "openGitRemote", false, "chrome.openGitRemote", findings);

	if (!pinnedValid || !defaultValid) {
		return DEFAULT_CHROME_CONFIG;
	}

	return Object.freeze({
		pinnedTabs: Object.freeze(pinnedTabs),
		defaultTabs: Object.freeze(defaultTabs),
		openGitRemote,
	});
}

// ─── [layout] ────────────────────────────────────────────────────────────────

function isSide(value: string): value is IdePosition & Justification {
	return value === "left" || value === "right";
}

export function parseLayoutSection(root: DocTable, findings: Finding[]): LayoutConfig {
	const table = openSection(root, "layout", KNOWN_LAYOUT_KEYS, findings);
	if (!table) return DEFAULT_LAYOUT_CONFIG;

	const smallScreenThreshold = readOptionalNumber(table, "smallScreenThreshold", "layout.smallScreenThreshold", findings);
	const windowHeight = readOptionalInteger(table, "windowHeight", "layout.windowHeight", findings);
	const maxWindowWidth = readOptionalNumber(table, "maxWindowWidth", "layout.maxWindowWidth", findings);
	const idePositionRaw = readOptionalString(table, "idePosition", "layout.idePosition", findings);
	const justificationRaw = readOptionalString(table, "justification", "layout.justification", findings);
	const maxGap = readOptionalInteger(table, "maxGap", "layout.maxGap", findings);

	const defaults = DEFAULT_LAYOUT_CONFIG;
	let valid = true;

	if (smallScreenThreshold !== undefined && !(Number.isFinite(smallScreenThreshold) && smallScreenThreshold > 0)) {
		findings.push(fail("layout.smallScreenThreshold must be > 0", {
			detail: `Got ${smallScreenThreshold}.`,
			fix: `Set smallScreenThreshold to a positive number (default: ${defaults.smallScreenThreshold}).`,
		}));
		valid = false;
	}

	if (windowHeight !== undefined && (windowHeight < 1n || windowHeight > 100n)) {
		findings.push(fail("layout.windowHeight must be between 1 and 100", {
			detail: `Got ${windowHeight}.`,
			fix: `Set windowHeight to a value between 1 and 100 (default: ${defaults.windowHeight}).`,
		}));
		valid = false;
	}

	if (maxWindowWidth !== undefined && !(Number.isFinite(maxWindowWidth) && maxWindowWidth > 0)) {
		findings.push(fail("layout.maxWindowWidth must be > 0", {
			detail: `Got ${maxWindowWidth}.`,
			fix: `Set maxWindowWidth to a positive number (default: ${defaults.maxWindowWidth}).`,
		}));
		valid = false;
	}

	let idePosition: IdePosition = defaults.idePosition;
	if (idePositionRaw !== undefined) {
		if (isSide(idePositionRaw)) {
			idePosition = idePositionRaw;
		} else {
			findings.push(fail('layout.idePosition must be "left" or "right"', {
				detail: `Got "${idePositionRaw}".`,
				fix: `Set idePosition to "left" or "right" (default: "${defaults.idePosition}").`,
			}));
			valid = false;
		}
	}

	let justification: Justification = defaults.justification;
	if (justificationRaw !== undefined) {
		if (isSide(justificationRaw)) {
			justification = justificationRaw;
		} else {
			findings.push(fail('layout.justification must be "left" or "right"', {
				detail: `Got "${justificationRaw}".`,
				fix: `Set justification to "left" or "right" (default: "${defaults.justification}").`,
			}));
			valid = false;
		}
	}

	if (maxGap !== undefined && (maxGap < 0n || maxGap > 100n)) {
		findings.push(fail("layout.maxGap must be between 0 and 100", {
			detail: `Got ${maxGap}.`,
			fix: `Set maxGap to a value between 0 and 100 (default: ${defaults.maxGap}).`,
		}));
		valid = false;
	}

	if (!valid) return defaults;

	return Object.freeze({
		smallScreenThreshold: smallScreenThreshold ?? defaults.smallScreenThreshold,
		windowHeight: windowHeight === undefined ? defaults.windowHeight : Number(windowHeight),
		maxWindowWidth: maxWindowWidth ?? defaults.maxWindowWidth,
		idePosition,
		justification,
		maxGap: maxGap === undefined ? defaults.maxGap : Number(maxGap),
	});
}
