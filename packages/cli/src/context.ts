/**
 * @workdeck/cli: What a command runs against.
 *
 * Everything with a side effect comes in through {@link CliDeps}, so tests
 * drive commands against a MemoryFileSystem and captured output.
 */

import type { Environment } from "@workdeck/config";
import type { FileSystem } from "@workdeck/core";
import type { ActivationEvent } from "@workdeck/switcher";

export const ExitCode = {
	Ok: 0,
	/** The config has FAIL findings, or could not be loaded. */
	Failure: 1,
	Usage: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface CliOutput {
	stdout(text: string): void;
	stderr(text: string): void;
}

export interface CliDeps {
	out: CliOutput;
	fs: FileSystem;
	env: Environment;
	now: () => Date;
	version: string;
	/** Whether stdout is a terminal. Colors are off otherwise. */
	isTTY: boolean;
	/** Most recent first. Used to order `list-projects`. */
	recentActivations?: readonly ActivationEvent[];
}

export interface CommandContext extends CliDeps {
	configPath: string;
	json: boolean;
	colors: boolean;
}

/** Write an `Error:` line to stderr. */
export function printError(ctx: CliDeps, message: string): void {
	ctx.out.stderr(`Error: ${message}\n`);
}

/** `value` as pretty JSON plus a newline. */
export function toJson(value: unknown): string {
	return `${JSON.stringify(value, null, 2)}\n`;
}
