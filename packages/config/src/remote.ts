/**
 * Remote-SSH authority parsing and shell quoting.
 *
 * Shared by config validation and by anything that later builds an `ssh`
 * command line from a project's remote, so both agree on what a valid
 * target is.
 */

import { err, ok } from "@workdeck/core";
import type { Result } from "@workdeck/core";

export const REMOTE_AUTHORITY_PREFIX = "ssh-remote+";

export type RemoteAuthorityError =
	| "missingPrefix"
	| "containsWhitespace"
	| "missingTarget"
	| "targetStartsWithDash";

/**
 * Parse `ssh-remote+user@host` into its SSH target (`user@host`).
 *
 * A target starting with `-` is rejected because `ssh` would read it as an option.
 * That check ignores leading whitespace and runs before the whitespace check,
 * so `"ssh-remote+ -x"` reports `targetStartsWithDash`.
 */
export function parseRemoteAuthority(authority: string): Result<string, RemoteAuthorityError> {
	if (!authority.startsWith(REMOTE_AUTHORITY_PREFIX)) return err("missingPrefix");

	const target = authority.slice(REMOTE_AUTHORITY_PREFIX.length);
	if (target.length === 0) return err("missingTarget");
	if (target.trimStart().startsWith("-")) return err("targetStartsWithDash");
	if (/\s/.test(authority)) return err("containsWhitespace");
	return ok(target);
}

/** The SSH target, or undefined if the authority is malformed. */
export function extractRemoteTarget(authority: string): string | undefined {
	const parsed = parseRemoteAuthority(authority);
	return parsed.ok ? parsed.value : undefined;
}

/**
 * POSIX single-quote escaping: `it's` becomes `'it'\''s'`.
 */
export function shellEscape(value: string): string {
	return `'${value.replaceAll("'", "'\\''")}'`;
}

/** Finding title for each parse error, keyed by error kind. */
export const REMOTE_AUTHORITY_MESSAGES: Readonly<Record<RemoteAuthorityError, string>> = {
	missingPrefix: `SSH remote authority must start with '${REMOTE_AUTHORITY_PREFIX}'`,
	containsWhitespace: "SSH remote authority must not contain whitespace",
	missingTarget: "SSH remote authority is missing host (expected ssh-remote+user@host)",
	targetStartsWithDash: "SSH remote authority must not start with '-'",
};
