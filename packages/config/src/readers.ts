/**
 * Field readers.
 *
 * Each reader looks up one key in a {@link DocTable} and either returns the
 * decoded value or records a FAIL finding and returns a safe fallback.
 * Absence of an optional key is never a finding. Readers never throw.
 *
 * `label` is the dotted path used in finding titles, e.g. `layout.maxGap`
 * or `project[2].name`.
 */

import type { DocTable, DocValue } from "./document.js";
import { fail } from "./findings.js";
import type { Finding } from "./types.js";

const STRING_FIX = (label: string) => `Set ${label} to a non-empty string.`;

function decodeNonEmptyString(
	value: DocValue,
	label: string,
	findings: Finding[],
): string | undefined {
	if (value.kind !== "string") {
		findings.push(fail(`${label} must be a string`, { fix: STRING_FIX(label) }));
		return undefined;
	}
	const trimmed = value.value.trim();
	if (trimmed.length === 0) {
		findings.push(fail(`${label} is empty`, { fix: STRING_FIX(label) }));
		return undefined;
	}
	return trimmed;
}

/** Required non-empty string, trimmed. Missing key is a failure. */
export function readRequiredString(
	table: DocTable,
	key: string,
	label: string,
	findings: Finding[],
): string | undefined {
	const value = table.get(key);
	if (value === undefined) {
		findings.push(fail(`${label} is missing`, { fix: STRING_FIX(label) }));
		return undefined;
	}
	return decodeNonEmptyString(value, label, findings);
}

/** Optional non-empty string, trimmed. */
export function readOptionalString(
	table: DocTable,
	key: string,
	label: string,
	findings: Finding[],
): string | undefined {
	const value = table.get(key);
	if (value === undefined) return undefined;
	return decodeNonEmptyString(value, label, findings);
}

/** Optional boolean; `defaultValue` when absent or wrongly typed. */
export function readOptionalBool(
	table: DocTable,
	key: string,
	defaultValue: boolean,
	label: string,
	findings: Finding[],
): boolean {
	const value = table.get(key);
	if (value === undefined) return defaultValue;
	if (value.kind !== "boolean") {
		findings.push(fail(`${label} must be a boolean`, { fix: `Set ${label} to true or false.` }));
		return defaultValue;
	}
	return value.value;
}

/** Optional number. TOML integers are widened, so `24` and `24.0` both read as 24. */
export function readOptionalNumber(
	table: DocTable,
	key: string,
	label: string,
	findings: Finding[],
): number | undefined {
	const value = table.get(key);
	if (value === undefined) return undefined;
	switch (value.kind) {
		case "integer":
			return Number(value.value);
		case "float":
			return value.value;
		default:
			findings.push(fail(`${label} must be a number`, { fix: `Set ${label} to a numeric value.` }));
			return undefined;
	}
}

/**
 * Optional integer, as written. Floats are rejected even when integral (`90.0`).
 * Callers bound-check the bigint before narrowing it to a number.
 */
export function readOptionalInteger(
	table: DocTable,
	key: string,
	label: string,
	findings: Finding[],
): bigint | undefined {
	const value = table.get(key);
	if (value === undefined) return undefined;
	if (value.kind !== "integer") {
		findings.push(fail(`${label} must be an integer`, { fix: `Set ${label} to a whole number.` }));
		return undefined;
	}
	return value.value;
}

/**
 * Optional array of strings; `[]` when absent.
 *
 * Non-string elements each get their own finding and are skipped; the
 * remaining strings are returned in order.
 */
export function readOptionalStringArray(
	table: DocTable,
	key: string,
	label: string,
	findings: Finding[],
): string[] {
	const value = table.get(key);
	if (value === undefined) return [];
	if (value.kind !== "array") {
		findings.push(fail(`${label} must be an array of strings`, {
			fix: `Set ${label} to an array of strings, e.g. ["https://example.com"].`,
		}));
		return [];
	}

	const result: string[] = [];
	value.items.forEach((item, i) => {
		if (item.kind !== "string") {
			findings.push(fail(`${label}[${i}] must be a string`, {
				fix: `Ensure all elements in ${label} are strings.`,
			}));
			return;
		}
		result.push(item.value);
	});
	return result;
}

/**
 * Check that every URL starts with `http://` or `https://` after trimming.
 * Records one finding per bad entry; returns false if any was bad.
 */
export function validateUrls(urls: readonly string[], label: string, findings: Finding[]): boolean {
	let allValid = true;
	urls.forEach((url, index) => {
		const trimmed = url.trim();
		if (!trimmed.startsWith("http://") && !trimmed.startsWith("https://")) {
			findings.push(fail(`${label}[${index}] is not a valid URL`, {
				detail: `Got "${trimmed}". URLs must start with http:// or https://.`,
				fix: "Use a full URL starting with http:// or https://.",
			}));
			allValid = false;
		}
	});
	return allValid;
}
