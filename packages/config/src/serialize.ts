/**
 * Config to TOML.
 *
 * Only what differs from the defaults is written, so the output reads like a
 * hand-written file and `parseConfig(serializeConfig(c)).config` equals `c`.
 */

import { stringify } from "smol-toml";
import {
	DEFAULT_AGENT_LAYER_CONFIG,
	DEFAULT_APP_CONFIG,
	DEFAULT_CHROME_CONFIG,
	DEFAULT_LAYOUT_CONFIG,
} from "./types.js";
import type { Config, ProjectConfig } from "./types.js";

type TomlTable = Record<string, unknown>;

/** The keys of `section` whose values differ from `defaults`. */
function changedFields<T extends object>(section: T, defaults: T): TomlTable {
	const out: TomlTable = {};
	const entries: [string, unknown][] = Object.entries(section);
	for (const [key, value] of entries) {
		const fallback: unknown = Reflect.get(defaults, key);
		const same = Array.isArray(value) && Array.isArray(fallback)
			? value.length === fallback.length && value.every((v, i) => v === fallback[i])
			: value === fallback;
		if (!same) out[key] = Array.isArray(value) ? [...value] : value;
	}
	return out;
}

function projectTable(project: ProjectConfig, agentLayerEnabled: boolean): TomlTable {
	const table: TomlTable = { name: project.name };
	if (project.remote !== undefined) table.remote = project.remote;
	table.path = project.path;
	table.color = project.color;
	if (project.useAgentLayer !== agentLayerEnabled) table.useAgentLayer = project.useAgentLayer;
	if (project.chromePinnedTabs.length > 0) table.chromePinnedTabs = [...project.chromePinnedTabs];
	if (project.chromeDefaultTabs.length > 0) table.chromeDefaultTabs = [...project.chromeDefaultTabs];
	return table;
}

export function serializeConfig(config: Config): string {
	const doc: TomlTable = {};

	const sections: [string, TomlTable][] = [
		["app", changedFields(config.app, DEFAULT_APP_CONFIG)],
		["agentLayer", changedFields(config.agentLayer, DEFAULT_AGENT_LAYER_CONFIG)],
		["chrome", changedFields(config.chrome, DEFAULT_CHROME_CONFIG)],
		["layout", changedFields(config.layout, DEFAULT_LAYOUT_CONFIG)],
	];
	for (const [name, table] of sections) {
		if (Object.keys(table).length > 0) doc[name] = table;
	}

	if (config.projects.length > 0) {
		doc.project = config.projects.map((p) => projectTable(p, config.agentLayer.enabled));
	}

	return stringify(doc);
}
