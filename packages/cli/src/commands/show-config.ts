/**
 * `workdeck show-config`: print the effective configuration.
 *
 * Text output is TOML holding only the values that differ from the defaults.
 * Problems found while loading are summarized on stderr.
 */

import { findingsOf, serializeConfig } from "@workdeck/config";
import { ExitCode, toJson } from "../context.js";
import type { CommandContext } from "../context.js";
import { loadForDisplay } from "./load.js";

export function showConfig(ctx: CommandContext): ExitCode {
	const result = loadForDisplay(ctx);
	const config = result?.config;
	if (result === undefined || config === undefined) return ExitCode.Failure;

	if (ctx.json) {
		ctx.out.stdout(toJson(config));
	} else {
		const toml = serializeConfig(config);
		if (toml.trim().length === 0) {
			ctx.out.stdout("# config.toml sets nothing; all defaults apply.\n");
		} else {
			ctx.out.stdout(toml.endsWith("\n") ? toml : `${toml}\n`);
		}
	}

	const failures = findingsOf(result.findings, "FAIL").length;
	const warnings = findingsOf(result.findings, "WARN").length;
	if (failures + warnings > 0) {
		ctx.out.stderr(
			`${plural(failures, "error")} and ${plural(warnings, "warning")} in ${ctx.configPath}; ` +
			"run 'workdeck doctor' for details.\n",
		);
	}
	return failures > 0 ? ExitCode.Failure : ExitCode.Ok;
}

function plural(n: number, noun: string): string {
	return `${n} ${noun}${n === 1 ? "" : "s"}`;
}
