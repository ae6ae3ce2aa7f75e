/**
 * Identifier normalization for project ids and workspace names.
 *
 * `"My Cool App!!"` becomes `"my-cool-app"`: lowercase, every run of
 * characters outside `[a-z0-9]` replaced by one hyphen, no hyphen at either
 * end. Normalizing an already-normalized id returns it unchanged.
 */

/** Ids that would collide with built-in workspaces. */
export const RESERVED_IDS: ReadonlySet<string> = new Set(["inbox"]);

export function normalizeId(value: string): string {
	return value
		.trim()
		.toLowerCase()
		.replace(/[^a-z0-9]+/g, "-")
		.replace(/^-+|-+$/g, "");
}

/** True if `value` normalizes to a non-empty id. */
export function isValidId(value: string): boolean {
	return normalizeId(value).length > 0;
}

/** `normalizedId` must already be normalized. */
export function isReservedId(normalizedId: string): boolean {
	return RESERVED_IDS.has(normalizedId);
}
