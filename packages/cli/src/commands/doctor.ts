/**
 * `workdeck doctor`: check config.toml and print a report.
 */

import { hasFailures, loadConfig } from "@workdeck/config";
import { configFindingsReport, countFindings, renderReport, sortFindings } from "@workdeck/ui";
import { ExitCode, toJson } from "../context.js";
import type { CommandContext } from "../context.js";

export function doctor(ctx: CommandContext): ExitCode {
	const outcome = loadConfig(ctx.configPath, ctx.fs);
	const report = configFindingsReport(outcome, {
		timestamp: ctx.now().toISOString(),
		version: ctx.version,
		configPath: ctx.configPath,
	});

	if (ctx.json) {
		ctx.out.stdout(toJson({
			...report,
			findings: sortFindings(report.findings),
			summary: countFindings(report.findings),
		}));
	} else {
		ctx.out.stdout(`${renderReport(report, { colors: ctx.colors })}\n`);
	}

	return hasFailures(report.findings) ? ExitCode.Failure : ExitCode.Ok;
}
