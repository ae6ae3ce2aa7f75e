import { loadConfig, PARSE_ERROR_TITLE } from "@workdeck/config";
import type { ConfigLoadResult } from "@workdeck/config";
import { printError } from "../context.js";
import type { CommandContext } from "../context.js";

/**
 * Load the config for a command that needs its contents.
 * Prints the reason and returns undefined when there is nothing to show.
 */
export function loadForDisplay(ctx: CommandContext): ConfigLoadResult | undefined {
	const outcome = loadConfig(ctx.configPath, ctx.fs);
	if (!outcome.ok) {
		printError(ctx, outcome.error.message);
		return undefined;
	}

	const result = outcome.value;
	if (result.hasParseError) {
		const finding = result.findings.find((f) => f.title === PARSE_ERROR_TITLE);
		printError(ctx, `${PARSE_ERROR_TITLE} in ${ctx.configPath}: ${finding?.detail ?? "unknown error"}`);
		return undefined;
	}
	return result;
}
