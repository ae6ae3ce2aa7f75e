/**
 * `workdeck list-projects [query]`: projects in switcher order.
 */

import { extractRemoteTarget, isRemoteProject, projectColorHex } from "@workdeck/config";
import type { ProjectConfig } from "@workdeck/config";
import { rankProjects } from "@workdeck/switcher";
import { renderTable, swatch } from "@workdeck/ui";
import { ExitCode, toJson } from "../context.js";
import type { CommandContext } from "../context.js";
import { loadForDisplay } from "./load.js";

/** `user@host:/path` for remote projects, the path otherwise. */
export function projectLocation(project: ProjectConfig): string {
	if (!isRemoteProject(project)) return project.path;
	return `${extractRemoteTarget(project.remote) ?? project.remote}:${project.path}`;
}

export function listProjects(ctx: CommandContext, query: string): ExitCode {
	const result = loadForDisplay(ctx);
	if (result === undefined) return ExitCode.Failure;

	const ranked = rankProjects(result.projects, query, ctx.recentActivations ?? []);

	if (ctx.json) {
		ctx.out.stdout(toJson(ranked.map((p) => ({ ...p, colorHex: projectColorHex(p.color) }))));
		return ExitCode.Ok;
	}

	if (result.projects.length === 0) {
		ctx.out.stdout("No projects configured.\n");
		return ExitCode.Ok;
	}
	if (ranked.length === 0) {
		ctx.out.stdout(`No projects match "${query.trim()}".\n`);
		return ExitCode.Ok;
	}

	const rows = ranked.map((p) => {
		const hex = projectColorHex(p.color);
		const color = ctx.colors && hex !== undefined ? `${swatch(hex)} ${p.color}` : p.color;
		return [p.id, p.name, color, projectLocation(p)];
	});
	const lines = renderTable(["ID", "NAME", "COLOR", "LOCATION"], rows, { colors: ctx.colors });
	ctx.out.stdout(`${lines.join("\n")}\n`);
	return ExitCode.Ok;
}
