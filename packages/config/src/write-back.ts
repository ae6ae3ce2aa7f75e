/**
 * Targeted write-back of `[app].autoStartAtLogin`.
 *
 * The file is edited line by line rather than re-serialized, so comments and
 * formatting elsewhere in the file survive.
 */

import { describeError, err, fileSystemError, ok } from "@workdeck/core";
import type { FileSystem, Result, WorkdeckError } from "@workdeck/core";

const KEY = "autoStartAtLogin";

/** Strip an inline `# comment` and surrounding whitespace. */
function withoutComment(line: string): string {
	const hash = line.indexOf("#");
	return (hash === -1 ? line : line.slice(0, hash)).trim();
}

function isAutoStartLine(trimmed: string): boolean {
	if (!trimmed.startsWith(KEY)) return false;
	const next = trimmed.charAt(KEY.length);
	return next === "" || next === "=" || /\s/.test(next);
}

/** `  autoStartAtLogin = true  # note` keeps its indentation and comment. */
function rewriteLine(line: string, literal: string): string {
	const indentation = /^[ \t]*/.exec(line)?.[0] ?? "";
	const hash = line.indexOf("#");
	const comment = hash === -1 ? "" : line.slice(line.slice(0, hash).trimEnd().length);
	return `${indentation}${KEY} = ${literal}${comment}`;
}

/**
 * Set `autoStartAtLogin` in the `[app]` section of `content`.
 *
 * Rewrites an existing key in place, inserts it right after an existing
 * `[app]` header, or appends a new `[app]` section at the end.
 */
export function updateAutoStartAtLogin(content: string, value: boolean): string {
	const literal = value ? "true" : "false";
	const lines = content.split("\n");

	const header = lines.findIndex((line) => withoutComment(line) === "[app]");

	if (header !== -1) {
		for (let i = header + 1; i < lines.length; i++) {
			const trimmed = lines[i].trim();
			if (trimmed.startsWith("[")) break;
			if (isAutoStartLine(trimmed)) {
				lines[i] = rewriteLine(lines[i], literal);
				return lines.join("\n");
			}
		}
		lines.splice(header + 1, 0, `${KEY} = ${literal}`);
		return lines.join("\n");
	}

	const last = lines[lines.length - 1];
	if (last !== undefined && last.trim().length > 0) {
		lines.push("");
	}
	lines.push("[app]", `${KEY} = ${literal}`);
	return lines.join("\n");
}

/** Read the file at `configPath`, update it, and write it back. */
export function setAutoStartAtLogin(
	value: boolean,
	configPath: string,
	fs: FileSystem,
): Result<void, WorkdeckError> {
	let content: string;
	try {
		content = new TextDecoder("utf-8", { fatal: true }).decode(fs.readFile(configPath));
	} catch (error) {
		return err(fileSystemError(`Failed to read config at ${configPath}`, describeError(error), error));
	}

	try {
		fs.writeFile(configPath, new TextEncoder().encode(updateAutoStartAtLogin(content, value)));
	} catch (error) {
		return err(fileSystemError(`Failed to write config at ${configPath}`, describeError(error), error));
	}
	return ok(undefined);
}
