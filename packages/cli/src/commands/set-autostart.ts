/**
 * `workdeck set-autostart <true|false>`: rewrite `[app].autoStartAtLogin`
 * in place, keeping the rest of the file as written.
 */

import { loadConfig, setAutoStartAtLogin } from "@workdeck/config";
import { ExitCode, printError } from "../context.js";
import type { CommandContext } from "../context.js";

/** `"true"` or `"false"`, exactly; anything else is undefined. */
export function parseBooleanArg(value: string): boolean | undefined {
	if (value === "true") return true;
	if (value === "false") return false;
	return undefined;
}

export function setAutostart(ctx: CommandContext, value: boolean): ExitCode {
	if (!ctx.fs.exists(ctx.configPath)) {
		// Writes the starter config; fileNotFound is the expected outcome.
		const bootstrap = loadConfig(ctx.configPath, ctx.fs);
		if (!bootstrap.ok && bootstrap.error.kind !== "fileNotFound") {
			printError(ctx, bootstrap.error.message);
			return ExitCode.Failure;
		}
	}

	const written = setAutoStartAtLogin(value, ctx.configPath, ctx.fs);
	if (!written.ok) {
		const { message, detail } = written.error;
		printError(ctx, detail === undefined ? message : `${message}: ${detail}`);
		return ExitCode.Failure;
	}

	ctx.out.stdout(`autoStartAtLogin = ${value} in ${ctx.configPath}\n`);
	return ExitCode.Ok;
}
