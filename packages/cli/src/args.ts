/**
 * @workdeck/cli: Argument parser.
 *
 * Simple CLI argument parser with no external dependencies.
 * Parses flags, the command, and its positional arguments from argv.
 */

export interface ParsedArgs {
	command?: string;
	/** --config <path> */
	configPath?: string;
	json?: boolean;
	noColor?: boolean;
	version?: boolean;
	help?: boolean;
	/** Positional arguments after the command. */
	rest: string[];
	/** Flags the parser does not know, in order. */
	unknown: string[];
	/** Set when a flag is missing its value. */
	error?: string;
}

/** Commands the CLI dispatches on. */
export const COMMANDS: ReadonlySet<string> = new Set([
	"doctor",
	"show-config",
	"list-projects",
	"set-autostart",
	"help",
	"version",
]);

/**
 * Parse argv into structured arguments.
 *
 * Expects argv WITHOUT the leading `node` and script path entries,
 * i.e., pass `process.argv.slice(2)`. Flags may appear before or after the
 * command. `--` ends flag parsing.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
	const result: ParsedArgs = {
		rest: [],
		unknown: [],
	};

	let i = 0;
	let flagsDone = false;

	while (i < argv.length) {
		const arg = argv[i];

		if (!flagsDone && arg === "--") {
			flagsDone = true;
			i++;
			continue;
		}

		if (!flagsDone && arg.startsWith("-") && arg !== "-") {
			// ─── Flags with values ──────────────────────────────────────
			if (arg === "--config" || arg.startsWith("--config=")) {
				const inline = arg.startsWith("--config=") ? arg.slice("--config=".length) : undefined;
				const value = inline ?? argv[i + 1];
				if (value === undefined || value.length === 0) {
					result.error = "--config requires a path";
				} else {
					result.configPath = value;
				}
				i += inline === undefined ? 2 : 1;
				continue;
			}

			// ─── Boolean flags ──────────────────────────────────────────
			if (arg === "--json") {
				result.json = true;
			} else if (arg === "--no-color") {
				result.noColor = true;
			} else if (arg === "-v" || arg === "--version") {
				result.version = true;
			} else if (arg === "-h" || arg === "--help") {
				result.help = true;
			} else {
				result.unknown.push(arg);
			}
			i++;
			continue;
		}

		// ─── Command, then positionals ──────────────────────────────────
		if (result.command === undefined) {
			result.command = arg;
		} else {
			result.rest.push(arg);
		}
		i++;
	}

	return result;
}

/** Help text, ending in a newline. */
export function helpText(): string {
	return `workdeck: project switcher configuration tool

Usage:
  workdeck <command> [options]

Commands:
  doctor                        Check config.toml and report problems
  show-config                   Print the effective configuration
  list-projects [query]         List projects, most recently used first
  set-autostart <true|false>    Set [app].autoStartAtLogin in config.toml
  help                          Show this help
  version                       Show version

Options:
  --config <path>               Use this config file instead of the default
  --json                        Machine-readable output
  --no-color                    Disable colors
  -v, --version                 Show version
  -h, --help                    Show this help

Environment:
  WORKDECK_CONFIG               Config file path (default: $XDG_CONFIG_HOME/workdeck/config.toml)
  LOG_LEVEL                     debug, info, warn, error or fatal (default: warn)

Exit codes:
  0  success
  1  the config has problems or could not be read
  2  usage error
`;
}
