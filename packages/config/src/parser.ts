/**
 * Parser orchestrator: TOML text in, {@link ConfigLoadResult} out.
 *
 * Never throws. A syntax error is the only outcome without a `config`;
 * validation failures are reported as findings next to a config assembled
 * from defaults and the entries that validated.
 */

import { parseDocument } from "./document.js";
import { fail } from "./findings.js";
import { parseProjects } from "./projects.js";
import {
	checkUnknownKeys,
	KNOWN_TOP_LEVEL_KEYS,
	parseAgentLayerSection,
	parseAppSection,
	parseChromeSection,
	parseLayoutSection,
} from "./sections.js";
import type { Config, ConfigLoadResult, Finding } from "./types.js";

export const PARSE_ERROR_TITLE = "Config TOML parse error";

export function parseConfig(text: string): ConfigLoadResult {
	const document = parseDocument(text);
	if (!document.ok) {
		return Object.freeze({
			findings: Object.freeze([
				fail(PARSE_ERROR_TITLE, {
					detail: document.error,
					fix: "Fix the TOML syntax in config.toml.",
				}),
			]),
			projects: Object.freeze([]),
			hasParseError: true,
		});
	}

	const root = document.value;
	const findings: Finding[] = [];

	checkUnknownKeys(root, KNOWN_TOP_LEVEL_KEYS, "top-level", findings);

	const app = parseAppSection(root, findings);
	const chrome = parseChromeSection(root, findings);
	const agentLayer = parseAgentLayerSection(root, findings);
	const layout = parseLayoutSection(root, findings);
	const projects = Object.freeze(parseProjects(root, agentLayer.enabled, findings));

	const config: Config = Object.freeze({ app, agentLayer, chrome, layout, projects });

	return Object.freeze({
		config,
		findings: Object.freeze(findings),
		projects,
		hasParseError: false,
	});
}
