/**
 * @workdeck/cli: Public API re-exports.
 *
 * The CLI package primarily serves as the `workdeck` binary entry point.
 * These re-exports let tests and other tools drive it programmatically.
 */

export { parseArgs, helpText, COMMANDS } from "./args.js";
export type { ParsedArgs } from "./args.js";
export { run } from "./main.js";
export { ExitCode } from "./context.js";
export type { CliDeps, CliOutput, CommandContext } from "./context.js";
export { projectLocation } from "./commands/list-projects.js";
export { parseBooleanArg } from "./commands/set-autostart.js";
