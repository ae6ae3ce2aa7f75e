/**
 * @workdeck/cli: Command dispatch.
 *
 * `run` turns argv into an exit code. It never exits the process and never
 * touches the real terminal or filesystem except through {@link CliDeps}.
 */

import { defaultConfigPath } from "@workdeck/config";
import { COMMANDS, helpText, parseArgs } from "./args.js";
import { doctor } from "./commands/doctor.js";
import { listProjects } from "./commands/list-projects.js";
import { parseBooleanArg, setAutostart } from "./commands/set-autostart.js";
import { showConfig } from "./commands/show-config.js";
import { ExitCode, printError } from "./context.js";
import type { CliDeps, CommandContext } from "./context.js";

function usageError(deps: CliDeps, message: string): ExitCode {
	printError(deps, message);
	deps.out.stderr("Run 'workdeck help' for usage.\n");
	return ExitCode.Usage;
}

export function run(argv: readonly string[], deps: CliDeps): ExitCode {
	const args = parseArgs(argv);

	if (args.error !== undefined) return usageError(deps, args.error);
	if (args.unknown.length > 0) return usageError(deps, `Unknown option: ${args.unknown[0]}`);

	if (args.version || args.command === "version") {
		deps.out.stdout(`workdeck ${deps.version}\n`);
		return ExitCode.Ok;
	}
	if (args.help || args.command === "help") {
		deps.out.stdout(helpText());
		return ExitCode.Ok;
	}

	const command = args.command;
	if (command === undefined) {
		deps.out.stderr(helpText());
		return ExitCode.Usage;
	}
	if (!COMMANDS.has(command)) return usageError(deps, `Unknown command: ${command}`);

	const ctx: CommandContext = {
		...deps,
		configPath: args.configPath ?? defaultConfigPath(deps.env),
		json: args.json ?? false,
		colors: !args.noColor && deps.isTTY && !deps.env.NO_COLOR,
	};

	switch (command) {
		case "doctor":
		case "show-config": {
			if (args.rest.length > 0) return usageError(deps, `Unexpected argument: ${args.rest[0]}`);
			return command === "doctor" ? doctor(ctx) : showConfig(ctx);
		}
		case "list-projects":
			return listProjects(ctx, args.rest.join(" "));
		case "set-autostart": {
			if (args.rest.length !== 1) return usageError(deps, "set-autostart takes exactly one value: true or false");
			const value = parseBooleanArg(args.rest[0]);
			if (value === undefined) {
				return usageError(deps, `Invalid value for set-autostart: "${args.rest[0]}" (expected true or false)`);
			}
			return setAutostart(ctx, value);
		}
		default:
			return usageError(deps, `Unknown command: ${command}`);
	}
}
