/**
 * Typed error hierarchy for workdeck.
 *
 * All workdeck errors extend {@link WorkdeckError}, which carries a
 * machine-readable `category` and `code` for programmatic handling.
 * Subsystems produce their own narrower errors and map them into these
 * categories so that the CLI and the diagnostics view can treat them uniformly.
 */

/** Categories of errors raised anywhere in workdeck. */
export type ErrorCategory =
	| "command"
	| "validation"
	| "fileSystem"
	| "configuration"
	| "parse"
	| "window"
	| "system";

export interface WorkdeckErrorOptions {
	/** Additional detail (e.g. stderr output, the content that failed to parse). */
	detail?: string;
	/** Command that was executed, if applicable. */
	command?: string;
	/** Exit code from command execution, if applicable. */
	exitCode?: number;
	cause?: unknown;
}

/**
 * Base error class for all workdeck errors.
 *
 * `code` is derived from the category (`"FILE_SYSTEM_ERROR"`, `"PARSE_ERROR"`, ...).
 */
export class WorkdeckError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly detail?: string;
	readonly command?: string;
	readonly exitCode?: number;

	constructor(category: ErrorCategory, message: string, opts: WorkdeckErrorOptions = {}) {
		super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
		this.name = "WorkdeckError";
		this.category = category;
		this.code = categoryCode(category);
		this.detail = opts.detail;
		this.command = opts.command;
		this.exitCode = opts.exitCode;
	}
}

function categoryCode(category: ErrorCategory): string {
	const snake = category.replace(/[A-Z]/g, (c) => `_${c}`).toUpperCase();
	return `${snake}_ERROR`;
}

// ─── Config Loading ──────────────────────────────────────────────────────────

/** Kind of config loading failure. */
export type ConfigErrorKind =
	/** Config file did not exist; a starter config was written in its place. */
	| "fileNotFound"
	/** The starter config could not be written. */
	| "createFailed"
	/** The config file exists but could not be read as UTF-8 text. */
	| "readFailed";

/**
 * I/O-level configuration failure: the config text could not be obtained.
 *
 * Content problems in a file that was read successfully are reported as
 * findings instead, never as a ConfigError.
 */
export class ConfigError extends WorkdeckError {
	readonly kind: ConfigErrorKind;
	readonly path: string;

	constructor(kind: ConfigErrorKind, path: string, message: string, cause?: unknown) {
		super(kind === "fileNotFound" ? "configuration" : "fileSystem", message, { cause });
		this.name = "ConfigError";
		this.kind = kind;
		this.path = path;
	}
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Build a validation error. */
export function validationError(message: string): WorkdeckError {
	return new WorkdeckError("validation", message);
}

/** Build a file system error, optionally with detail about the failure. */
export function fileSystemError(message: string, detail?: string, cause?: unknown): WorkdeckError {
	return new WorkdeckError("fileSystem", message, { detail, cause });
}

/** Build a parse error. `detail` is typically the content that failed to parse. */
export function parseError(message: string, detail?: string): WorkdeckError {
	return new WorkdeckError("parse", message, { detail });
}

/** Build a configuration error. */
export function configurationError(message: string, detail?: string): WorkdeckError {
	return new WorkdeckError("configuration", message, { detail });
}

/**
 * Build an error for a failed external command.
 * The trimmed stderr becomes the detail; an empty stderr leaves it unset.
 */
export function commandError(command: string, exitCode: number, stderr: string): WorkdeckError {
	const trimmed = stderr.trim();
	return new WorkdeckError("command", `${command} failed with exit code ${exitCode}.`, {
		detail: trimmed.length > 0 ? trimmed : undefined,
		command,
		exitCode,
	});
}

/** Human-readable message of an unknown thrown value. */
export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
