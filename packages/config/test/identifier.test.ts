import { describe, it, expect } from "vitest";
import { isReservedId, isValidId, normalizeId } from "../src/identifier.js";

describe("normalizeId", () => {
	it("should lowercase and hyphenate runs of other characters", () => {
		expect(normalizeId("My Cool App!!")).toBe("my-cool-app");
		expect(normalizeId("foo__bar  baz")).toBe("foo-bar-baz");
	});

	it("should trim hyphens at both ends", () => {
		expect(normalizeId("  --Hello, World--  ")).toBe("hello-world");
	});

	it("should drop non-ASCII letters", () => {
		expect(normalizeId("Café Ünits")).toBe("caf-nits");
	});

	it("should be idempotent", () => {
		for (const input of ["My Cool App!!", "a.b.c", "__x__", "already-normal"]) {
			const once = normalizeId(input);
			expect(normalizeId(once)).toBe(once);
		}
	});

	it("should return an empty string when nothing survives", () => {
		expect(normalizeId("!!!")).toBe("");
		expect(isValidId("!!!")).toBe(false);
		expect(isValidId("a!")).toBe(true);
	});
});

describe("isReservedId", () => {
	it("should reserve inbox", () => {
		expect(isReservedId("inbox")).toBe(true);
		expect(isReservedId("inbox-2")).toBe(false);
	});
});
