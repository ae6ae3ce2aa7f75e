/**
 * Typed view over the TOML parser's output.
 *
 * smol-toml returns plain JS values; this module classifies them into a
 * closed variant set so that every field reader can switch exhaustively on
 * `kind` instead of probing `typeof` at each call site. Integers are parsed as
 * `bigint`, which keeps `24` and `24.0` distinguishable.
 */

import { parse as parseToml } from "smol-toml";
import { describeError, err, ok } from "@workdeck/core";
import type { Result } from "@workdeck/core";

export type DocTable = ReadonlyMap<string, DocValue>;

export type DocValue =
	| { readonly kind: "string"; readonly value: string }
	| { readonly kind: "integer"; readonly value: bigint }
	| { readonly kind: "float"; readonly value: number }
	| { readonly kind: "boolean"; readonly value: boolean }
	| { readonly kind: "datetime"; readonly value: string }
	| { readonly kind: "array"; readonly items: readonly DocValue[] }
	| { readonly kind: "table"; readonly table: DocTable };

/**
 * Parse TOML text into a root table.
 * The error side carries the parser's message (with line and column).
 */
export function parseDocument(text: string): Result<DocTable, string> {
	let root: DocValue;
	try {
		root = toDocValue(parseToml(text, { integersAsBigInt: true }));
	} catch (error) {
		return err(describeError(error));
	}
	if (root.kind !== "table") {
		return err(`expected a TOML table at the document root, found ${root.kind}`);
	}
	return ok(root.table);
}

/** Classify one parsed TOML value. */
export function toDocValue(raw: unknown): DocValue {
	switch (typeof raw) {
		case "string":
			return { kind: "string", value: raw };
		case "bigint":
			return { kind: "integer", value: raw };
		case "number":
			return { kind: "float", value: raw };
		case "boolean":
			return { kind: "boolean", value: raw };
		default:
			break;
	}
	if (raw instanceof Date) {
		return { kind: "datetime", value: raw.toISOString() };
	}
	if (Array.isArray(raw)) {
		return { kind: "array", items: raw.map((item: unknown) => toDocValue(item)) };
	}
	if (typeof raw === "object" && raw !== null) {
		const table = new Map<string, DocValue>();
		for (const [key, value] of Object.entries(raw)) {
			table.set(key, toDocValue(value));
		}
		return { kind: "table", table };
	}
	throw new TypeError(`unsupported TOML value of type ${typeof raw}`);
}

/** Build a table from plain values. Mostly useful in tests. */
export function docTable(entries: Record<string, unknown>): DocTable {
	const value = toDocValue(entries);
	if (value.kind !== "table") {
		throw new TypeError("docTable expects an object");
	}
	return value.table;
}
