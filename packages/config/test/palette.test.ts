import { describe, it, expect } from "vitest";
import {
	isNamedColor,
	isValidHexColor,
	projectColorHex,
	PROJECT_COLOR_NAMES,
	resolveProjectColor,
} from "../src/palette.js";

describe("palette", () => {
	it("should list 15 sorted names", () => {
		expect(PROJECT_COLOR_NAMES).toHaveLength(15);
		expect(PROJECT_COLOR_NAMES[0]).toBe("black");
		expect(PROJECT_COLOR_NAMES[14]).toBe("yellow");
		expect([...PROJECT_COLOR_NAMES].sort()).toEqual(PROJECT_COLOR_NAMES);
	});

	it("should validate hex colors", () => {
		expect(isValidHexColor("#1a2B3c")).toBe(true);
		expect(isValidHexColor("#123")).toBe(false);
		expect(isValidHexColor("123456")).toBe(false);
		expect(isValidHexColor("#12345g")).toBe(false);
	});

	it("should match names case-insensitively", () => {
		expect(isNamedColor("Teal")).toBe(true);
		expect(isNamedColor("magenta")).toBe(false);
	});

	it("should resolve hex channels to 0..1", () => {
		expect(resolveProjectColor("#FF0000")).toEqual({ red: 1, green: 0, blue: 0 });
		expect(resolveProjectColor(" #000000 ")).toEqual({ red: 0, green: 0, blue: 0 });
		expect(resolveProjectColor("nope")).toBeUndefined();
	});

	it("should render uppercase hex", () => {
		expect(projectColorHex("teal")).toBe("#008080");
		expect(projectColorHex("indigo")).toBe("#4B0082");
		expect(projectColorHex("#abcdef")).toBe("#ABCDEF");
		expect(projectColorHex("nope")).toBeUndefined();
	});
});
