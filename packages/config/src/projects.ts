/**
 * `[[project]]` entries.
 *
 * Unlike the global sections, a project has no sensible default: an entry
 * that fails a required field, its id, color, remote, path or tab URL rules is
 * dropped from the project list. A wrongly typed optional field only falls
 * back to its default.
 */

import type { DocTable } from "./document.js";
import { fail, warn } from "./findings.js";
import { isReservedId, normalizeId } from "./identifier.js";
import { isNamedColor, isValidHexColor, PROJECT_COLOR_NAMES } from "./palette.js";
import {
	readOptionalBool,
	readOptionalString,
	readOptionalStringArray,
	readRequiredString,
	validateUrls,
} from "./readers.js";
import { parseRemoteAuthority, REMOTE_AUTHORITY_MESSAGES, REMOTE_AUTHORITY_PREFIX } from "./remote.js";
import { checkUnknownKeys } from "./sections.js";
import type { Finding, ProjectConfig } from "./types.js";

export const KNOWN_PROJECT_KEYS: ReadonlySet<string> = new Set([
	"name",
	"remote",
	"path",
	"color",
	"useAgentLayer",
	"chromePinnedTabs",
	"chromeDefaultTabs",
]);

const REMOTE_FORMAT_FIX = 'Use format: remote = "ssh-remote+user@host"';

/**
 * Parse every `[[project]]` entry in declaration order.
 *
 * @param agentLayerEnabled - `agentLayer.enabled`, the default for `useAgentLayer`.
 */
export function parseProjects(
	root: DocTable,
	agentLayerEnabled: boolean,
	findings: Finding[],
): ProjectConfig[] {
	const value = root.get("project");
	if (value === undefined || (value.kind === "array" && value.items.length === 0)) {
		findings.push(warn("No [[project]] entries", {
			fix: "Add at least one [[project]] entry to config.toml.",
		}));
		return [];
	}
	if (value.kind !== "array") {
		findings.push(fail("project must be an array of tables", {
			fix: "Use [[project]] entries in config.toml.",
		}));
		return [];
	}

	const projects: ProjectConfig[] = [];
	const seenIds = new Map<string, number>();

	value.items.forEach((item, index) => {
		if (item.kind !== "table") {
			findings.push(fail(`project[${index}] must be a table`, {
				fix: "Ensure each [[project]] entry is a TOML table.",
			}));
			return;
		}
		const project = parseProject(item.table, index, agentLayerEnabled, seenIds, findings);
		if (project) projects.push(project);
	});

	return projects;
}

/**
 * Parse one entry. Returns undefined if the entry is not usable.
 * Every derived id is recorded in `seenIds`, even when the entry is later
 * dropped for another reason.
 */
export function parseProject(
	table: DocTable,
	index: number,
	agentLayerEnabled: boolean,
	seenIds: Map<string, number>,
	findings: Finding[],
): ProjectConfig | undefined {
	const label = `project[${index}]`;
	let valid = true;

	checkUnknownKeys(table, KNOWN_PROJECT_KEYS, "[[project]]", findings);

	const name = readRequiredString(table, "name", `${label}.name`, findings);
	const remote = readOptionalString(table, "remote", `${label}.remote`, findings);
	const path = readRequiredString(table, "path", `${label}.path`, findings);
	const colorRaw = readRequiredString(table, "color", `${label}.color`, findings);
	const useAgentLayer = readOptionalBool(table, "useAgentLayer", agentLayerEnabled, `${label}.useAgentLayer`, findings);

	// id
	let id: string | undefined;
	if (name !== undefined) {
		const normalized = normalizeId(name);
		if (normalized.length === 0) {
			findings.push(fail(`${label}.name cannot derive an id`, {
				detail: "Normalized id was empty after removing invalid characters.",
				fix: "Use a name with letters or numbers so an id can be derived.",
			}));
			valid = false;
		} else if (isReservedId(normalized)) {
			findings.push(fail(`${label}.id is reserved`, {
				detail: `The id '${normalized}' is reserved.`,
				fix: "Choose a different project name so the derived id is not reserved.",
			}));
			valid = false;
		} else {
			const existing = seenIds.get(normalized);
			if (existing !== undefined) {
				findings.push(fail(`Duplicate project.id: ${normalized}`, {
					detail: `Derived from project indexes ${existing} and ${index}.`,
					fix: "Ensure project names normalize to unique ids.",
				}));
				valid = false;
			} else {
				id = normalized;
				seenIds.set(normalized, index);
			}
		}
	}

	// color
	let color: string | undefined;
	if (colorRaw !== undefined) {
		if (isValidHexColor(colorRaw)) {
			color = colorRaw;
		} else if (isNamedColor(colorRaw)) {
			color = colorRaw.toLowerCase();
		} else {
			findings.push(fail(`${label}.color is invalid`, {
				detail: "Color must be #RRGGBB or a named color.",
				fix: `Use a hex color or one of: ${PROJECT_COLOR_NAMES.join(", ")}.`,
			}));
			valid = false;
		}
	}

	// remote and path
	let validRemote: string | undefined;
	if (remote !== undefined) {
		const parsed = parseRemoteAuthority(remote);
		if (parsed.ok) {
			validRemote = remote;
		} else {
			findings.push(fail(`${label}.remote: ${REMOTE_AUTHORITY_MESSAGES[parsed.error]}`, { fix: REMOTE_FORMAT_FIX }));
			valid = false;
		}
	}

	if (validRemote !== undefined) {
		if (useAgentLayer) {
			findings.push(fail(`${label}: Agent Layer is not supported with SSH projects`, {
				fix: "Set useAgentLayer = false for this project (SSH projects cannot use Agent Layer).",
			}));
			valid = false;
		}
		if (path !== undefined && !path.startsWith("/")) {
			findings.push(fail(`${label}.path: remote path must be an absolute path (starting with /)`, {
				fix: "Use a remote absolute path, e.g. /home/you/src/project",
			}));
			valid = false;
		}
	} else if (path !== undefined) {
		if (path.startsWith(REMOTE_AUTHORITY_PREFIX)) {
			findings.push(fail(`${label}.path: legacy SSH path format is not supported`, {
				detail: "Found an ssh-remote+ prefix in project.path but project.remote is not set.",
				fix: 'Use remote = "ssh-remote+user@host" and path = "/remote/absolute/path"',
			}));
			valid = false;
		} else if (!path.startsWith("/")) {
			findings.push(fail(`${label}.path: local path must be an absolute path (starting with /)`, {
				fix: "Use an absolute path, e.g. /home/you/src/project",
			}));
			valid = false;
		}
	}

	// tabs
	const chromePinnedTabs = readOptionalStringArray(table, "chromePinnedTabs", `${label}.chromePinnedTabs`, findings);
	if (!validateUrls(chromePinnedTabs, `${label}.chromePinnedTabs`, findings)) valid = false;
	const chromeDefaultTabs = readOptionalStringArray(table, "chromeDefaultTabs", `${label}.chromeDefaultTabs`, findings);
	if (!validateUrls(chromeDefaultTabs, `${label}.chromeDefaultTabs`, findings)) valid = false;

	if (
		name === undefined ||
		path === undefined ||
		color === undefined ||
		id === undefined ||
		!valid
	) {
		return undefined;
	}

	const project: ProjectConfig = {
		id,
		name,
		path,
		color,
		useAgentLayer,
		chromePinnedTabs: Object.freeze(chromePinnedTabs),
		chromeDefaultTabs: Object.freeze(chromeDefaultTabs),
		...(validRemote !== undefined ? { remote: validRemote } : {}),
	};
	return Object.freeze(project);
}
